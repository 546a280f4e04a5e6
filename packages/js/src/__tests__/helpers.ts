import { Parser, Quad } from 'n3';
import { isomorphic } from 'rdf-isomorphic';
import { Box } from '../box.js';
import { EXAMPLE_PREFIX_MAP, PrefixMap } from '../converter.js';
import { EXAMPLE_ONTOLOGY_IRI, getRdfGraph } from '../ontology.js';

const TURTLE_PREFIXES = `
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .
@prefix oboInOwl: <http://www.geneontology.org/formats/oboInOwl#> .
@prefix OMO: <http://purl.obolibrary.org/obo/OMO_> .
@prefix IAO: <http://purl.obolibrary.org/obo/IAO_> .
@prefix a: <https://example.org/a:> .
@prefix dcterms: <http://purl.org/dc/terms/> .
@prefix orcid: <https://orcid.org/> .
`;

export function parseTurtle(turtle: string): Quad[] {
    return new Parser().parse(TURTLE_PREFIXES + turtle);
}

/** The quads the boxes emit inside the example ontology. */
export function quadsOf(boxes: readonly Box[], prefixMap: PrefixMap = { ...EXAMPLE_PREFIX_MAP }): Quad[] {
    return getRdfGraph(boxes, prefixMap).getQuads(null, null, null, null);
}

/** Whether the boxes emit exactly the given Turtle, next to the example ontology node. */
export function emitsTurtle(boxes: readonly Box[], turtle: string): boolean {
    const expected = parseTurtle(`<${EXAMPLE_ONTOLOGY_IRI}> a owl:Ontology .\n${turtle}`);
    return isomorphic(quadsOf(boxes), expected);
}
