/**
 * Namespaces and well-known terms used by the OWL 2 RDF mapping.
 */

import { DataFactory } from 'n3';
import type { NamedNode } from '@rdfjs/types';
import { Reference } from './reference.js';

const { namedNode } = DataFactory;

// ── Namespaces ────────────────────────────────────────────────────

export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

const rdf = (local: string): NamedNode => namedNode(RDF_NS + local);
const rdfs = (local: string): NamedNode => namedNode(RDFS_NS + local);
const xsd = (local: string): NamedNode => namedNode(XSD_NS + local);
const owl = (local: string): NamedNode => namedNode(OWL_NS + local);

export const RDF = {
    type: rdf('type'),
    first: rdf('first'),
    rest: rdf('rest'),
    nil: rdf('nil'),
    List: rdf('List'),
    PlainLiteral: rdf('PlainLiteral'),
    langString: rdf('langString'),
    XMLLiteral: rdf('XMLLiteral'),
} as const;

export const RDFS = {
    subClassOf: rdfs('subClassOf'),
    subPropertyOf: rdfs('subPropertyOf'),
    domain: rdfs('domain'),
    range: rdfs('range'),
    label: rdfs('label'),
    comment: rdfs('comment'),
    seeAlso: rdfs('seeAlso'),
    isDefinedBy: rdfs('isDefinedBy'),
    Datatype: rdfs('Datatype'),
    Literal: rdfs('Literal'),
} as const;

export const XSD = {
    string: xsd('string'),
    boolean: xsd('boolean'),
    integer: xsd('integer'),
    decimal: xsd('decimal'),
    date: xsd('date'),
    dateTime: xsd('dateTime'),
    nonNegativeInteger: xsd('nonNegativeInteger'),
} as const;

export const OWL = {
    // entities
    Class: owl('Class'),
    ObjectProperty: owl('ObjectProperty'),
    DatatypeProperty: owl('DatatypeProperty'),
    AnnotationProperty: owl('AnnotationProperty'),
    NamedIndividual: owl('NamedIndividual'),
    Thing: owl('Thing'),
    Nothing: owl('Nothing'),
    topObjectProperty: owl('topObjectProperty'),
    bottomObjectProperty: owl('bottomObjectProperty'),
    topDataProperty: owl('topDataProperty'),
    bottomDataProperty: owl('bottomDataProperty'),
    real: owl('real'),
    rational: owl('rational'),
    // ontology header
    Ontology: owl('Ontology'),
    versionIRI: owl('versionIRI'),
    imports: owl('imports'),
    // class expressions and data ranges
    intersectionOf: owl('intersectionOf'),
    unionOf: owl('unionOf'),
    complementOf: owl('complementOf'),
    oneOf: owl('oneOf'),
    datatypeComplementOf: owl('datatypeComplementOf'),
    onDatatype: owl('onDatatype'),
    withRestrictions: owl('withRestrictions'),
    inverseOf: owl('inverseOf'),
    Restriction: owl('Restriction'),
    onProperty: owl('onProperty'),
    onProperties: owl('onProperties'),
    someValuesFrom: owl('someValuesFrom'),
    allValuesFrom: owl('allValuesFrom'),
    hasValue: owl('hasValue'),
    hasSelf: owl('hasSelf'),
    onClass: owl('onClass'),
    onDataRange: owl('onDataRange'),
    minCardinality: owl('minCardinality'),
    maxCardinality: owl('maxCardinality'),
    cardinality: owl('cardinality'),
    minQualifiedCardinality: owl('minQualifiedCardinality'),
    maxQualifiedCardinality: owl('maxQualifiedCardinality'),
    qualifiedCardinality: owl('qualifiedCardinality'),
    // axioms
    equivalentClass: owl('equivalentClass'),
    disjointWith: owl('disjointWith'),
    AllDisjointClasses: owl('AllDisjointClasses'),
    members: owl('members'),
    disjointUnionOf: owl('disjointUnionOf'),
    propertyChainAxiom: owl('propertyChainAxiom'),
    equivalentProperty: owl('equivalentProperty'),
    propertyDisjointWith: owl('propertyDisjointWith'),
    AllDisjointProperties: owl('AllDisjointProperties'),
    FunctionalProperty: owl('FunctionalProperty'),
    InverseFunctionalProperty: owl('InverseFunctionalProperty'),
    ReflexiveProperty: owl('ReflexiveProperty'),
    IrreflexiveProperty: owl('IrreflexiveProperty'),
    SymmetricProperty: owl('SymmetricProperty'),
    AsymmetricProperty: owl('AsymmetricProperty'),
    TransitiveProperty: owl('TransitiveProperty'),
    hasKey: owl('hasKey'),
    sameAs: owl('sameAs'),
    differentFrom: owl('differentFrom'),
    AllDifferent: owl('AllDifferent'),
    distinctMembers: owl('distinctMembers'),
    // annotations and reification
    Axiom: owl('Axiom'),
    Annotation: owl('Annotation'),
    annotatedSource: owl('annotatedSource'),
    annotatedProperty: owl('annotatedProperty'),
    annotatedTarget: owl('annotatedTarget'),
    NegativePropertyAssertion: owl('NegativePropertyAssertion'),
    sourceIndividual: owl('sourceIndividual'),
    assertionProperty: owl('assertionProperty'),
    targetIndividual: owl('targetIndividual'),
    targetValue: owl('targetValue'),
    deprecated: owl('deprecated'),
    versionInfo: owl('versionInfo'),
    priorVersion: owl('priorVersion'),
    backwardCompatibleWith: owl('backwardCompatibleWith'),
    incompatibleWith: owl('incompatibleWith'),
} as const;

// ── Skip lists ────────────────────────────────────────────────────

/** Classes that never get an `owl:Class` declaration. */
export const BUILTIN_CLASSES: ReadonlySet<string> = new Set([OWL.Thing.value, OWL.Nothing.value]);

export const BUILTIN_OBJECT_PROPERTIES: ReadonlySet<string> = new Set([
    OWL.topObjectProperty.value,
    OWL.bottomObjectProperty.value,
]);

export const BUILTIN_DATA_PROPERTIES: ReadonlySet<string> = new Set([
    OWL.topDataProperty.value,
    OWL.bottomDataProperty.value,
]);

/** Annotation properties the OWL 2 vocabulary already declares. */
export const BUILTIN_ANNOTATION_PROPERTIES: ReadonlySet<string> = new Set([
    RDFS.label.value,
    RDFS.comment.value,
    RDFS.seeAlso.value,
    RDFS.isDefinedBy.value,
    OWL.deprecated.value,
    OWL.versionInfo.value,
    OWL.priorVersion.value,
    OWL.backwardCompatibleWith.value,
    OWL.incompatibleWith.value,
]);

/** Datatypes of the OWL 2 datatype map; everything in `xsd:` is included by namespace. */
export function isBuiltinDatatype(iri: string): boolean {
    return iri.startsWith(XSD_NS) || [
        RDFS.Literal.value,
        RDF.PlainLiteral.value,
        RDF.langString.value,
        RDF.XMLLiteral.value,
        OWL.real.value,
        OWL.rational.value,
    ].includes(iri);
}

// ── Curation vocabulary ───────────────────────────────────────────

export const label = new Reference('rdfs', 'label', 'label');
export const comment = new Reference('rdfs', 'comment', 'comment');
export const seeAlso = new Reference('rdfs', 'seeAlso', 'see also');
export const deprecated = new Reference('owl', 'deprecated', 'deprecated');
export const hasDescription = new Reference('dcterms', 'description', 'description');
export const hasContributor = new Reference('dcterms', 'contributor', 'contributor');
export const hasDbXref = new Reference('oboInOwl', 'hasDbXref', 'has database cross-reference');
export const hasOboNamespace = new Reference('oboInOwl', 'hasOBONamespace', 'has OBO namespace');
export const inSubset = new Reference('oboInOwl', 'inSubset', 'in subset');
export const consider = new Reference('oboInOwl', 'consider', 'consider');
export const isAnonymous = new Reference('oboInOwl', 'is_anonymous', 'is anonymous');
export const isBuiltin = new Reference('oboInOwl', 'builtin', 'builtin');
export const isClassLevel = new Reference('oboInOwl', 'is_class_level', 'is class level');
export const isCyclic = new Reference('oboInOwl', 'is_cyclic', 'is cyclic');
export const hasSynonymType = new Reference('oboInOwl', 'hasSynonymType', 'has synonym type');
export const hasScope = new Reference('oboInOwl', 'hasScope', 'has scope');
export const subsetProperty = new Reference('oboInOwl', 'SubsetProperty', 'subset property');
export const synonymTypeProperty = new Reference('oboInOwl', 'SynonymTypeProperty', 'synonym type property');
export const alternativeTerm = new Reference('IAO', '0000118', 'alternative term');
export const termReplacedBy = new Reference('IAO', '0100001', 'term replaced by');
export const hasOntologyRootTerm = new Reference('IAO', '0000700', 'has ontology root term');
export const mappingHasJustification = new Reference('sssom', 'mapping_justification', 'mapping justification');

export const hasExactSynonym = new Reference('oboInOwl', 'hasExactSynonym', 'has exact synonym');
export const hasBroadSynonym = new Reference('oboInOwl', 'hasBroadSynonym', 'has broad synonym');
export const hasNarrowSynonym = new Reference('oboInOwl', 'hasNarrowSynonym', 'has narrow synonym');
export const hasRelatedSynonym = new Reference('oboInOwl', 'hasRelatedSynonym', 'has related synonym');

export type SynonymScope = 'EXACT' | 'BROAD' | 'NARROW' | 'RELATED';

export const SYNONYM_SCOPES: Readonly<Record<SynonymScope, Reference>> = {
    EXACT: hasExactSynonym,
    BROAD: hasBroadSynonym,
    NARROW: hasNarrowSynonym,
    RELATED: hasRelatedSynonym,
};

export type SemanticMappingScope = 'EXACT' | 'BROAD' | 'NARROW' | 'CLOSE' | 'RELATED';

export const SEMANTIC_MAPPING_SCOPES: Readonly<Record<SemanticMappingScope, Reference>> = {
    EXACT: new Reference('skos', 'exactMatch', 'exact match'),
    BROAD: new Reference('skos', 'broadMatch', 'broad match'),
    NARROW: new Reference('skos', 'narrowMatch', 'narrow match'),
    CLOSE: new Reference('skos', 'closeMatch', 'close match'),
    RELATED: new Reference('skos', 'relatedMatch', 'related match'),
};

export function isSynonymScope(value: string): value is SynonymScope {
    return Object.prototype.hasOwnProperty.call(SYNONYM_SCOPES, value);
}

export function isSemanticMappingScope(value: string): value is SemanticMappingScope {
    return Object.prototype.hasOwnProperty.call(SEMANTIC_MAPPING_SCOPES, value);
}
