/**
 * Macros: shorthands for the axiom patterns that ontologies in the OBO
 * world write over and over. A macro wraps exactly one axiom and renders
 * as that axiom in both functional syntax and RDF.
 */

import type { Literal } from '@rdfjs/types';
import { Annotation } from './annotations.js';
import {
    AnnotationAssertion,
    Axiom,
    EquivalentClasses,
    ObjectPropertyChain,
    SubClassOf,
    SubObjectPropertyOf,
} from './axioms.js';
import { Box } from './box.js';
import {
    ClassExpression,
    DataMaxCardinality,
    DataPropertyExpression,
    ObjectIntersectionOf,
    ObjectSomeValuesFrom,
    ObjectUnionOf,
} from './expressions.js';
import { IdentifierBoxOrHint, LiteralBox, PrimitiveHint } from './primitives.js';
import { EmissionContext, Resource } from './rdf.js';
import { Reference } from './reference.js';
import {
    alternativeTerm,
    comment,
    consider,
    deprecated,
    hasDbXref,
    hasDescription,
    hasOboNamespace,
    hasRelatedSynonym,
    hasSynonymType,
    inSubset,
    isAnonymous,
    isBuiltin,
    isClassLevel,
    isCyclic,
    isSemanticMappingScope,
    isSynonymScope,
    label,
    mappingHasJustification,
    SEMANTIC_MAPPING_SCOPES,
    SemanticMappingScope,
    SYNONYM_SCOPES,
    SynonymScope,
    termReplacedBy,
} from './vocabulary.js';

/** A box standing in for the axiom it wraps. */
export abstract class Macro extends Box {
    readonly box: Axiom;

    protected constructor(box: Axiom) {
        super();
        this.box = box;
    }

    toRdf(ctx: EmissionContext): Resource {
        return this.box.toRdf(ctx);
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

// ── Relationships ─────────────────────────────────────────────────

/**
 * An existential relationship between classes. The RAET1E gene only
 * exists in humans:
 *
 * ```ts
 * new RelationshipMacro('hgnc:16793', 'RO:0002160', 'NCBITaxon:9606').toFunowl();
 * // SubClassOf(hgnc:16793 ObjectSomeValuesFrom(RO:0002160 NCBITaxon:9606))
 * ```
 */
export class RelationshipMacro extends Macro {
    constructor(
        subject: IdentifierBoxOrHint,
        predicate: IdentifierBoxOrHint,
        target: IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(new SubClassOf(subject, new ObjectSomeValuesFrom(predicate, target), annotations));
    }
}

// ── String annotations ────────────────────────────────────────────

export interface StringMacroOptions {
    language?: string;
    annotations?: readonly Annotation[];
}

function toLiteralBox(value: string | Literal, language?: string): LiteralBox {
    return typeof value === 'string' ? new LiteralBox(value, language) : new LiteralBox(value);
}

abstract class StringMacro extends Macro {
    constructor(property: Reference, subject: IdentifierBoxOrHint, value: string | Literal, options: StringMacroOptions = {}) {
        super(new AnnotationAssertion(property, subject, toLiteralBox(value, options.language), options.annotations));
    }
}

/** `new LabelMacro('hgnc:16793', 'RAET1E', { language: 'en' })` is `AnnotationAssertion(rdfs:label hgnc:16793 "RAET1E"@en)`. */
export class LabelMacro extends StringMacro {
    constructor(subject: IdentifierBoxOrHint, value: string | Literal, options?: StringMacroOptions) {
        super(label, subject, value, options);
    }
}

export class DescriptionMacro extends StringMacro {
    constructor(subject: IdentifierBoxOrHint, value: string | Literal, options?: StringMacroOptions) {
        super(hasDescription, subject, value, options);
    }
}

export class CommentMacro extends StringMacro {
    constructor(subject: IdentifierBoxOrHint, value: string | Literal, options?: StringMacroOptions) {
        super(comment, subject, value, options);
    }
}

export class OBONamespaceMacro extends StringMacro {
    constructor(subject: IdentifierBoxOrHint, value: string | Literal, options?: StringMacroOptions) {
        super(hasOboNamespace, subject, value, options);
    }
}

// ── Object annotations ────────────────────────────────────────────

abstract class ObjectAnnotationMacro extends Macro {
    constructor(property: Reference, subject: IdentifierBoxOrHint, target: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(new AnnotationAssertion(property, subject, target, annotations));
    }
}

/** An alternative term for the subject. */
export class AltMacro extends ObjectAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, target: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(alternativeTerm, subject, target, annotations);
    }
}

/** The subject is obsolete and `target` replaces it. */
export class ReplacedByMacro extends ObjectAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, target: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(termReplacedBy, subject, target, annotations);
    }
}

export class OBOConsiderMacro extends ObjectAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, target: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(consider, subject, target, annotations);
    }
}

export class OBOIsSubsetMacro extends ObjectAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, subset: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(inSubset, subject, subset, annotations);
    }
}

// ── Boolean annotations ───────────────────────────────────────────

abstract class BooleanAnnotationMacro extends Macro {
    constructor(property: Reference, subject: IdentifierBoxOrHint, value: boolean) {
        super(new AnnotationAssertion(property, subject, new LiteralBox(value)));
    }
}

export class IsAnonymousMacro extends BooleanAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, value = true) {
        super(isAnonymous, subject, value);
    }
}

export class IsOBOBuiltinMacro extends BooleanAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, value = true) {
        super(isBuiltin, subject, value);
    }
}

export class OBOIsClassLevelMacro extends BooleanAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, value = true) {
        super(isClassLevel, subject, value);
    }
}

/** `AnnotationAssertion(owl:deprecated GO:0000001 "true"^^xsd:boolean)` */
export class IsObsoleteMacro extends BooleanAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, value = true) {
        super(deprecated, subject, value);
    }
}

export class IsCyclicMacro extends BooleanAnnotationMacro {
    constructor(subject: IdentifierBoxOrHint, value = true) {
        super(isCyclic, subject, value);
    }
}

// ── Synonyms and mappings ─────────────────────────────────────────

export interface SynonymMacroOptions extends StringMacroOptions {
    synonymType?: IdentifierBoxOrHint;
    /** Sources of the synonym, attached as database cross-references. */
    provenance?: readonly PrimitiveHint[];
}

/**
 * A synonym. The scope is one of EXACT, BROAD, NARROW or RELATED (the
 * default), or the predicate itself.
 *
 * ```ts
 * new SynonymMacro('hgnc:16793', 'ULBP4', 'EXACT', { synonymType: 'OMO:0003008' }).toFunowl();
 * // AnnotationAssertion(Annotation(oboInOwl:hasSynonymType OMO:0003008) oboInOwl:hasExactSynonym hgnc:16793 "ULBP4")
 * ```
 */
export class SynonymMacro extends Macro {
    constructor(
        subject: IdentifierBoxOrHint,
        value: string | Literal,
        scope?: SynonymScope | IdentifierBoxOrHint,
        options: SynonymMacroOptions = {},
    ) {
        const { language, annotations = [], synonymType, provenance = [] } = options;
        const allAnnotations = [
            ...annotations,
            ...provenance.map((source) => new Annotation(hasDbXref, source)),
            ...(synonymType === undefined ? [] : [new Annotation(hasSynonymType, synonymType)]),
        ];
        super(new AnnotationAssertion(synonymPredicate(scope), subject, toLiteralBox(value, language), allAnnotations));
    }
}

function synonymPredicate(scope: SynonymScope | IdentifierBoxOrHint | undefined): IdentifierBoxOrHint {
    if (scope === undefined) {
        return hasRelatedSynonym;
    }
    if (typeof scope === 'string') {
        const upper = scope.toUpperCase();
        if (isSynonymScope(upper)) {
            return SYNONYM_SCOPES[upper];
        }
    }
    return scope;
}

export interface MappingMacroOptions {
    annotations?: readonly Annotation[];
    /** A term from the semantic mapping vocabulary, such as `semapv:ManualMappingCuration`. */
    mappingJustification?: IdentifierBoxOrHint;
}

/**
 * A mapping between two entities. The predicate is one of EXACT, BROAD,
 * NARROW, CLOSE or RELATED (mapped to SKOS) or any other predicate.
 */
export class MappingMacro extends Macro {
    constructor(
        subject: IdentifierBoxOrHint,
        predicate: SemanticMappingScope | IdentifierBoxOrHint,
        target: IdentifierBoxOrHint,
        options: MappingMacroOptions = {},
    ) {
        const { annotations = [], mappingJustification } = options;
        const allAnnotations = mappingJustification === undefined
            ? annotations
            : [...annotations, new Annotation(mappingHasJustification, mappingJustification)];
        super(new AnnotationAssertion(mappingPredicate(predicate), subject, target, allAnnotations));
    }
}

function mappingPredicate(predicate: SemanticMappingScope | IdentifierBoxOrHint): IdentifierBoxOrHint {
    if (typeof predicate === 'string') {
        const upper = predicate.toUpperCase();
        if (isSemanticMappingScope(upper)) {
            return SEMANTIC_MAPPING_SCOPES[upper];
        }
    }
    return predicate;
}

/** `AnnotationAssertion(oboInOwl:hasDbXref agrovoc:0619dd9e agro:00000137)` */
export class XrefMacro extends MappingMacro {
    constructor(subject: IdentifierBoxOrHint, target: IdentifierBoxOrHint, options?: MappingMacroOptions) {
        super(subject, hasDbXref, target, options);
    }
}

// ── Property chains ───────────────────────────────────────────────

/** The OBO "holds over chain": the chain implies the predicate. */
export class HoldsOverChain extends Macro {
    constructor(predicate: IdentifierBoxOrHint, chain: readonly IdentifierBoxOrHint[]) {
        super(new SubObjectPropertyOf(new ObjectPropertyChain(chain), predicate));
    }
}

/**
 * Occurs in (`BFO:0000066`) is transitive over part of (`BFO:0000050`):
 * whatever occurs in X also occurs in whatever X is part of.
 *
 * ```ts
 * new TransitiveOver('BFO:0000066', 'BFO:0000050').toFunowl();
 * // SubObjectPropertyOf(ObjectPropertyChain(BFO:0000066 BFO:0000050) BFO:0000066)
 * ```
 */
export class TransitiveOver extends HoldsOverChain {
    constructor(predicate: IdentifierBoxOrHint, target: IdentifierBoxOrHint) {
        super(predicate, [predicate, target]);
    }
}

// ── Class-level shorthands ────────────────────────────────────────

/** `SubClassOf(owl:Thing DataMaxCardinality(1 a:hasAge))`: nothing has more than one age. */
export class DataPropertyMaxCardinality extends Macro {
    constructor(cardinality: number, dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint) {
        super(new SubClassOf('owl:Thing', new DataMaxCardinality(cardinality, dataPropertyExpression)));
    }
}

/** A class, or a `[property, filler]` pair read as `ObjectSomeValuesFrom(property filler)`. */
export type ClassListElement = IdentifierBoxOrHint | readonly [IdentifierBoxOrHint, IdentifierBoxOrHint];

function isPair(element: ClassListElement): element is readonly [IdentifierBoxOrHint, IdentifierBoxOrHint] {
    return Array.isArray(element);
}

function toClassExpression(element: ClassListElement): ClassExpression | IdentifierBoxOrHint {
    return isPair(element) ? new ObjectSomeValuesFrom(element[0], element[1]) : element;
}

/**
 * A zebrafish neuron (`ZFA:0000134`) is a neuron that is part of a zebrafish:
 *
 * ```ts
 * new ClassIntersectionMacro('ZFA:0000134', ['CL:0000540', ['BFO:0000050', 'NCBITaxon:7955']]).toFunowl();
 * // EquivalentClasses(ZFA:0000134 ObjectIntersectionOf(CL:0000540 ObjectSomeValuesFrom(BFO:0000050 NCBITaxon:7955)))
 * ```
 */
export class ClassIntersectionMacro extends Macro {
    constructor(term: IdentifierBoxOrHint, elements: readonly ClassListElement[], annotations?: readonly Annotation[]) {
        super(new EquivalentClasses([term, new ObjectIntersectionOf(elements.map(toClassExpression))], annotations));
    }
}

export class ClassUnionMacro extends Macro {
    constructor(term: IdentifierBoxOrHint, elements: readonly ClassListElement[], annotations?: readonly Annotation[]) {
        super(new EquivalentClasses([term, new ObjectUnionOf(elements.map(toClassExpression))], annotations));
    }
}
