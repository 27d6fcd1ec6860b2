import { defineModel } from '../models.js';
import { BIBO_NS, DCTERMS_NS, FABIO_NS, PCDM_NS, XSD_DATE, XSD_INTEGER } from '../namespaces.js';

/**
 * Newspaper issues. Pages are embedded objects of the issue
 * (`<issue>#page-1`), addressed per row through the INDEX column:
 * `page[0]=#page-1;page[1]=#page-2`.
 */
export const Issue = defineModel({
    name: 'newspaper.Issue',
    types: [`${BIBO_NS}Issue`, `${PCDM_NS}Object`],
    properties: {
        title: { predicate: `${DCTERMS_NS}title` },
        date: { predicate: `${DCTERMS_NS}date`, datatype: XSD_DATE },
        volume: { predicate: `${BIBO_NS}volume` },
        issue: { predicate: `${BIBO_NS}issue` },
        edition: { predicate: `${BIBO_NS}edition` },
    },
    embedded: {
        page: {
            predicate: `${PCDM_NS}hasMember`,
            properties: {
                title: { predicate: `${DCTERMS_NS}title` },
                number: { predicate: `${FABIO_NS}hasSequenceIdentifier`, datatype: XSD_INTEGER },
            },
        },
    },
    headerMap: {
        'Title': 'title',
        'Date': 'date',
        'Volume': 'volume',
        'Issue': 'issue',
        'Edition': 'edition',
        'Page Title': 'page.title',
        'Page Number': 'page.number',
    },
});
