import { defineModel } from '../models.js';
import { BIBO_NS, DC_NS, DCTERMS_NS, EDM_NS, XSD_DATE } from '../namespaces.js';

/** Archival letters: flat descriptive metadata, no embedded objects. */
export const Letter = defineModel({
    name: 'letter.Letter',
    types: [`${BIBO_NS}Letter`],
    properties: {
        title: { predicate: `${DCTERMS_NS}title` },
        author: { predicate: `${DCTERMS_NS}creator`, kind: 'reference' },
        recipient: { predicate: `${BIBO_NS}recipient`, kind: 'reference' },
        part_of: { predicate: `${DCTERMS_NS}isPartOf`, kind: 'reference' },
        place: { predicate: `${DCTERMS_NS}spatial`, kind: 'reference' },
        subject: { predicate: `${DCTERMS_NS}subject`, kind: 'reference' },
        rights: { predicate: `${DCTERMS_NS}rights`, kind: 'reference' },
        identifier: { predicate: `${DCTERMS_NS}identifier` },
        type: { predicate: `${EDM_NS}hasType` },
        description: { predicate: `${DCTERMS_NS}description`, lang: 'en' },
        language: { predicate: `${DC_NS}language` },
        date: { predicate: `${DCTERMS_NS}date`, datatype: XSD_DATE },
        extent: { predicate: `${DCTERMS_NS}extent` },
    },
    headerMap: {
        'Title': 'title',
        'Author': 'author',
        'Recipient': 'recipient',
        'Part Of': 'part_of',
        'Place': 'place',
        'Subject': 'subject',
        'Rights': 'rights',
        'Identifier': 'identifier',
        'Type': 'type',
        'Description': 'description',
        'Language': 'language',
        'Date': 'date',
        'Extent': 'extent',
    },
});
