/**
 * Vocabulary namespaces and the terms the built-in models use.
 */

// ── Namespaces ────────────────────────────────────────────────────
export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const DC_NS = 'http://purl.org/dc/elements/1.1/';
export const DCTERMS_NS = 'http://purl.org/dc/terms/';
export const BIBO_NS = 'http://purl.org/ontology/bibo/';
export const EDM_NS = 'http://www.europeana.eu/schemas/edm/';
export const PCDM_NS = 'http://pcdm.org/models#';
export const FABIO_NS = 'http://purl.org/spar/fabio/';

// ── XML Schema datatypes ──────────────────────────────────────────
export const XSD_STRING = `${XSD_NS}string`;
export const XSD_INTEGER = `${XSD_NS}integer`;
export const XSD_DECIMAL = `${XSD_NS}decimal`;
export const XSD_BOOLEAN = `${XSD_NS}boolean`;
export const XSD_DATE = `${XSD_NS}date`;
export const XSD_DATE_TIME = `${XSD_NS}dateTime`;
export const XSD_G_YEAR = `${XSD_NS}gYear`;

export const RDF_TYPE = `${RDF_NS}type`;

// ── Reserved columns ──────────────────────────────────────────────
/** Column holding the resource URI */
export const COLUMN_URI = 'URI';
/** Column holding the embedded-object index descriptor */
export const COLUMN_INDEX = 'INDEX';

/** Separator between values in a multi-valued cell */
export const VALUE_SEPARATOR = '|';
