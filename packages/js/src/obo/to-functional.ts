/**
 * Conversion of OBO ontologies into functional OWL documents.
 *
 * Axioms come out stanza by stanza in a fixed order so that the output is
 * stable and diffs cleanly against earlier releases.
 */

import { DataFactory } from 'n3';
import { Annotation } from '../annotations.js';
import {
    AnnotationAssertion,
    AnnotationPropertyDomain,
    AnnotationPropertyRange,
    AsymmetricObjectProperty,
    ClassAssertion,
    Declaration,
    DisjointClasses,
    DisjointObjectProperties,
    EquivalentClasses,
    EquivalentObjectProperties,
    FunctionalObjectProperty,
    InverseFunctionalObjectProperty,
    InverseObjectProperties,
    ObjectPropertyAssertion,
    ObjectPropertyChain,
    ObjectPropertyDomain,
    ObjectPropertyRange,
    ReflexiveObjectProperty,
    SubAnnotationPropertyOf,
    SubClassOf,
    SubObjectPropertyOf,
    SymmetricObjectProperty,
    TransitiveObjectProperty,
} from '../axioms.js';
import { loadConfig } from '../config.js';
import { DEFAULT_PREFIX_MAP } from '../converter.js';
import { NotImplementedError } from '../errors.js';
import { logger } from '../logger.js';
import {
    ClassIntersectionMacro,
    ClassUnionMacro,
    CommentMacro,
    DescriptionMacro,
    HoldsOverChain,
    IsAnonymousMacro,
    IsCyclicMacro,
    IsOBOBuiltinMacro,
    IsObsoleteMacro,
    LabelMacro,
    OBOConsiderMacro,
    OBOIsClassLevelMacro,
    OBOIsSubsetMacro,
    OBONamespaceMacro,
    RelationshipMacro,
    ReplacedByMacro,
    SynonymMacro,
    TransitiveOver,
    XrefMacro,
} from '../macros.js';
import { Document, Ontology, OntologyAxiom } from '../ontology.js';
import { IdentifierBox, LiteralBox } from '../primitives.js';
import { Reference } from '../reference.js';
import { OboOntologyMetadataSchema, validate } from '../schemas.js';
import {
    alternativeTerm,
    hasDbXref,
    hasDescription,
    hasOntologyRootTerm,
    hasScope,
    subsetProperty,
    SYNONYM_SCOPES,
    synonymTypeProperty,
    XSD_NS,
} from '../vocabulary.js';
import {
    isOboLiteral,
    OboAnnotation,
    OboLiteral,
    OboOntology,
    OboStanza,
    OboTerm,
    OboTypeDef,
    OboValue,
} from './types.js';

const { literal, namedNode } = DataFactory;

export interface OboConversionOptions {
    /** Where ontology IRIs are minted; defaults to the configured `iriBase`. */
    iriBase?: string;
}

// ── Documents ─────────────────────────────────────────────────────

/**
 * Convert a whole OBO ontology. The ontology IRI is
 * `{iriBase}/{prefix}/{prefix}.ofn`, with the data version spliced in
 * before the file name for the version IRI.
 */
export function getOfnFromObo(obo: OboOntology, options: OboConversionOptions = {}): Document {
    const metadata = validate(OboOntologyMetadataSchema, {
        ontology: obo.ontology,
        dataVersion: obo.dataVersion,
        idspaces: obo.idspaces,
    });
    const prefix = metadata.ontology;
    const base = `${trimSlash(options.iriBase ?? loadConfig().iriBase)}/${prefix}`;
    const axioms = [...getOntologyAxioms(obo)];
    const ontology = new Ontology({
        iri: `${base}/${prefix}.ofn`,
        versionIri: metadata.dataVersion === undefined ? undefined : `${base}/${metadata.dataVersion}/${prefix}.ofn`,
        annotations: [...getOntologyAnnotations(obo)],
        axioms,
    });
    logger.info('converted OBO ontology', {
        ontology: prefix,
        terms: obo.terms?.length ?? 0,
        typedefs: obo.typedefs?.length ?? 0,
        axioms: axioms.length,
    });
    return new Document(ontology, { ...DEFAULT_PREFIX_MAP, ...metadata.idspaces });
}

function trimSlash(iri: string): string {
    return iri.endsWith('/') ? iri.slice(0, -1) : iri;
}

/** Ontology-level annotations: the root terms, then the property values. */
export function* getOntologyAnnotations(obo: OboOntology): Iterable<Annotation> {
    for (const root of obo.rootTerms ?? []) {
        yield new Annotation(hasOntologyRootTerm, root);
    }
    for (const property of obo.properties ?? []) {
        yield convertAnnotation(property);
    }
}

/**
 * Header declarations for root terms, subsets and synonym types, then every
 * type definition, then every term.
 */
export function* getOntologyAxioms(obo: OboOntology): Iterable<OntologyAxiom> {
    if (obo.rootTerms && obo.rootTerms.length > 0) {
        yield new Declaration(hasOntologyRootTerm, 'AnnotationProperty');
        yield new LabelMacro(hasOntologyRootTerm, hasOntologyRootTerm.name ?? hasOntologyRootTerm.curie);
    }

    const subsetdefs = obo.subsetdefs ?? [];
    if (subsetdefs.length > 0) {
        yield new Declaration(subsetProperty, 'AnnotationProperty');
        for (const subset of subsetdefs) {
            yield new Declaration(subset.reference, 'AnnotationProperty');
            yield new LabelMacro(subset.reference, subset.name);
            yield new SubAnnotationPropertyOf(subset.reference, subsetProperty);
        }
    }

    const synonymTypedefs = obo.synonymTypedefs ?? [];
    if (synonymTypedefs.length > 0) {
        yield new Declaration(hasScope, 'AnnotationProperty');
        for (const synonymType of synonymTypedefs) {
            yield new Declaration(synonymType.reference, 'AnnotationProperty');
            yield new LabelMacro(synonymType.reference, synonymType.name);
            yield new SubAnnotationPropertyOf(synonymType.reference, synonymTypeProperty);
            if (synonymType.specificity !== undefined) {
                yield new AnnotationAssertion(hasScope, synonymType.reference, SYNONYM_SCOPES[synonymType.specificity]);
            }
        }
    }

    for (const typedef of obo.typedefs ?? []) {
        yield* getTypedefAxioms(typedef);
    }
    for (const term of obo.terms ?? []) {
        yield* getTermAxioms(term);
    }
}

// ── Terms ─────────────────────────────────────────────────────────

/** Axioms for a term, or for an individual when the term's type is `Instance`. */
export function* getTermAxioms(term: OboTerm): Iterable<OntologyAxiom> {
    const s = new IdentifierBox(term.reference);
    const isClass = (term.type ?? 'Term') === 'Term';

    if (isClass) {
        yield new Declaration(s, 'Class');
        for (const parent of term.parents ?? []) {
            yield new SubClassOf(s, parent);
        }
    } else {
        yield new Declaration(s, 'NamedIndividual');
        for (const parent of term.parents ?? []) {
            yield new ClassAssertion(parent, s);
        }
    }
    if (term.isAnonymous !== undefined) {
        yield new IsAnonymousMacro(s, term.isAnonymous);
    }
    if (term.name) {
        yield new LabelMacro(s, term.name);
    }
    if (term.namespace) {
        yield new OBONamespaceMacro(s, term.namespace);
    }
    for (const alt of term.altIds ?? []) {
        yield new ReplacedByMacro(alt, s);
    }
    yield* definitionAxioms(term, s);
    for (const subset of term.subsets ?? []) {
        yield new OBOIsSubsetMacro(s, subset);
    }
    yield* synonymAxioms(term, s);
    yield* xrefAxioms(term, s);
    if (term.builtin !== undefined) {
        yield new IsOBOBuiltinMacro(s, term.builtin);
    }
    yield* propertyAxioms(term, s);

    if (term.intersectionOf && term.intersectionOf.length > 0) {
        yield new ClassIntersectionMacro(s, term.intersectionOf);
    }
    if (term.unionOf && term.unionOf.length > 0) {
        yield new ClassUnionMacro(s, term.unionOf);
    }
    if (term.equivalentTo && term.equivalentTo.length > 0) {
        yield new EquivalentClasses([s, ...term.equivalentTo]);
    }
    if (term.disjointFrom && term.disjointFrom.length > 0) {
        yield new DisjointClasses([s, ...term.disjointFrom]);
    }
    for (const [relation, target] of term.relationships ?? []) {
        const annotations = getAnnotations(term, relation, target);
        yield isClass
            ? new RelationshipMacro(s, relation, target, annotations)
            : new ObjectPropertyAssertion(relation, s, target, annotations);
    }
    if (term.isObsolete !== undefined) {
        yield new IsObsoleteMacro(s, term.isObsolete);
    }
}

// ── Type definitions ──────────────────────────────────────────────

/** Axioms for a relation; metadata tags come out as annotation properties. */
export function* getTypedefAxioms(typedef: OboTypeDef): Iterable<OntologyAxiom> {
    const r = new IdentifierBox(typedef.reference);
    const isMetadataTag = typedef.isMetadataTag === true;

    yield new Declaration(r, isMetadataTag ? 'AnnotationProperty' : 'ObjectProperty');
    if (typedef.isAnonymous !== undefined) {
        yield new IsAnonymousMacro(r, typedef.isAnonymous);
    }
    if (typedef.name) {
        yield new LabelMacro(r, typedef.name);
    }
    if (typedef.namespace) {
        yield new OBONamespaceMacro(r, typedef.namespace);
    }
    // alternative IDs point at the primary one rather than the other way round
    for (const alt of typedef.altIds ?? []) {
        yield new ReplacedByMacro(alt, r);
    }
    yield* definitionAxioms(typedef, r);
    if (typedef.comment) {
        yield new CommentMacro(r, typedef.comment);
    }
    for (const subset of typedef.subsets ?? []) {
        yield new OBOIsSubsetMacro(r, subset);
    }
    yield* synonymAxioms(typedef, r);
    yield* xrefAxioms(typedef, r);
    yield* propertyAxioms(typedef, r);

    if (typedef.domain) {
        yield isMetadataTag ? new AnnotationPropertyDomain(r, typedef.domain) : new ObjectPropertyDomain(r, typedef.domain);
    }
    if (typedef.range) {
        yield isMetadataTag ? new AnnotationPropertyRange(r, typedef.range) : new ObjectPropertyRange(r, typedef.range);
    }
    if (typedef.builtin !== undefined) {
        yield new IsOBOBuiltinMacro(r, typedef.builtin);
    }
    for (const chain of typedef.holdsOverChain ?? []) {
        yield new HoldsOverChain(r, chain);
    }
    if (typedef.isAntiSymmetric) {
        yield new AsymmetricObjectProperty(r);
    }
    if (typedef.isCyclic !== undefined) {
        yield new IsCyclicMacro(r, typedef.isCyclic);
    }
    if (typedef.isReflexive) {
        yield new ReflexiveObjectProperty(r);
    }
    if (typedef.isSymmetric) {
        yield new SymmetricObjectProperty(r);
    }
    if (typedef.isTransitive) {
        yield new TransitiveObjectProperty(r);
    }
    if (typedef.isFunctional) {
        yield new FunctionalObjectProperty(r);
    }
    if (typedef.isInverseFunctional) {
        yield new InverseFunctionalObjectProperty(r);
    }
    for (const parent of typedef.parents ?? []) {
        yield isMetadataTag ? new SubAnnotationPropertyOf(r, parent) : new SubObjectPropertyOf(r, parent);
    }
    if (typedef.equivalentTo && typedef.equivalentTo.length > 0) {
        yield new EquivalentObjectProperties([r, ...typedef.equivalentTo]);
    }
    for (const other of typedef.disjointFrom ?? []) {
        yield new DisjointObjectProperties([other, r]);
    }
    if (typedef.inverse) {
        yield new InverseObjectProperties(r, typedef.inverse);
    }
    for (const target of typedef.transitiveOver ?? []) {
        yield new TransitiveOver(r, target);
    }
    for (const chain of typedef.equivalentToChain ?? []) {
        yield new SubObjectPropertyOf(new ObjectPropertyChain(chain), r);
    }
    if (typedef.isObsolete !== undefined) {
        yield new IsObsoleteMacro(r, typedef.isObsolete);
    }
    for (const replacement of typedef.replacedBy ?? []) {
        yield new ReplacedByMacro(replacement, r);
    }
    for (const reference of typedef.seeAlso ?? []) {
        yield new OBOConsiderMacro(r, reference);
    }
    if (typedef.isClassLevel !== undefined) {
        yield new OBOIsClassLevelMacro(r, typedef.isClassLevel);
    }
}

// ── Shared stanza parts ───────────────────────────────────────────

function* definitionAxioms(stanza: OboStanza, s: IdentifierBox): Iterable<OntologyAxiom> {
    if (stanza.definition) {
        yield new DescriptionMacro(s, stanza.definition, {
            annotations: getAnnotations(stanza, hasDescription, stanza.definition),
        });
    }
}

function* synonymAxioms(stanza: OboStanza, s: IdentifierBox): Iterable<OntologyAxiom> {
    for (const synonym of stanza.synonyms ?? []) {
        yield new SynonymMacro(s, synonym.name, synonym.specificity, {
            language: synonym.language,
            synonymType: synonym.type,
            provenance: synonym.provenance,
            annotations: (synonym.annotations ?? []).map(convertAnnotation),
        });
    }
}

function* xrefAxioms(stanza: OboStanza, s: IdentifierBox): Iterable<OntologyAxiom> {
    for (const xref of stanza.xrefs ?? []) {
        yield new XrefMacro(s, xref, { annotations: getAnnotations(stanza, hasDbXref, xref) });
    }
}

function* propertyAxioms(stanza: OboStanza, s: IdentifierBox): Iterable<OntologyAxiom> {
    for (const { predicate, value } of stanza.properties ?? []) {
        const annotations = getAnnotations(stanza, predicate, value);
        if (isOboLiteral(value)) {
            yield new AnnotationAssertion(predicate, s, oboLiteralToLiteral(value), annotations);
        } else if (predicate.equals(alternativeTerm)) {
            // written the other way round, as term-replaced-by
            logger.debug('skipped alternative term property', { subject: s.toFunowl(), value: value.curie });
        } else {
            yield new AnnotationAssertion(predicate, s, value, annotations);
        }
    }
}

// ── Values and annotations ────────────────────────────────────────

/**
 * Turn an OBO literal into an RDF literal.
 *
 * @throws NotImplementedError for datatypes outside the `xsd` prefix
 */
export function oboLiteralToLiteral(value: OboLiteral): LiteralBox {
    if (value.datatype.prefix !== 'xsd') {
        throw new NotImplementedError(`Automatic literal conversion is not implemented for prefix: ${value.datatype.prefix}`);
    }
    return new LiteralBox(literal(value.value, namedNode(`${XSD_NS}${value.datatype.identifier}`)));
}

function convertAnnotation(annotation: OboAnnotation): Annotation {
    const { predicate, value } = annotation;
    return new Annotation(predicate, isOboLiteral(value) ? oboLiteralToLiteral(value) : value);
}

function sameValue(left: OboValue | string, right: OboValue | string): boolean {
    if (typeof left === 'string' || typeof right === 'string') {
        return left === right;
    }
    if (left instanceof Reference || right instanceof Reference) {
        return left instanceof Reference && right instanceof Reference && left.equals(right);
    }
    return left.value === right.value && left.datatype.equals(right.datatype);
}

/** The annotations the stanza carries on its own `predicate value` statement. */
function getAnnotations(stanza: OboStanza, predicate: Reference, value: OboValue | string): Annotation[] {
    return (stanza.axiomAnnotations ?? [])
        .filter((entry) => entry.predicate.equals(predicate) && sameValue(entry.value, value))
        .flatMap((entry) => entry.annotations.map(convertAnnotation));
}
