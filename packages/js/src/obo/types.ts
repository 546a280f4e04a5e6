/**
 * The structured OBO model the adapter reads. Parsing OBO flat files into
 * this shape happens elsewhere; every field but the reference is optional
 * and an absent field produces no axioms.
 */

import type { PrefixMap } from '../converter.js';
import { Reference } from '../reference.js';
import type { SynonymScope } from '../vocabulary.js';

/** A typed value such as `"2.5" xsd:decimal`. */
export interface OboLiteral {
    readonly value: string;
    readonly datatype: Reference;
}

export type OboValue = Reference | OboLiteral;

export function isOboLiteral(value: OboValue): value is OboLiteral {
    return !(value instanceof Reference);
}

/** A predicate/value pair: a property value on a stanza, or an annotation on one. */
export interface OboAnnotation {
    readonly predicate: Reference;
    readonly value: OboValue;
}

/**
 * Annotations on one of the stanza's own statements, picked out by its
 * predicate and value (for a definition, the definition text).
 */
export interface OboAxiomAnnotations {
    readonly predicate: Reference;
    readonly value: OboValue | string;
    readonly annotations: readonly OboAnnotation[];
}

export interface OboSynonym {
    readonly name: string;
    readonly specificity?: SynonymScope;
    readonly type?: Reference;
    readonly language?: string;
    /** Where the synonym comes from, as database cross-references. */
    readonly provenance?: readonly Reference[];
    readonly annotations?: readonly OboAnnotation[];
}

/** Fields shared by terms and type definitions. */
export interface OboStanza {
    readonly reference: Reference;
    readonly name?: string;
    readonly isAnonymous?: boolean;
    readonly namespace?: string;
    readonly altIds?: readonly Reference[];
    readonly definition?: string;
    readonly subsets?: readonly Reference[];
    readonly synonyms?: readonly OboSynonym[];
    readonly xrefs?: readonly Reference[];
    readonly builtin?: boolean;
    /** Property values in file order. */
    readonly properties?: readonly OboAnnotation[];
    readonly isObsolete?: boolean;
    readonly axiomAnnotations?: readonly OboAxiomAnnotations[];
}

export type OboTermType = 'Term' | 'Instance';

export interface OboTerm extends OboStanza {
    /** Defaults to `Term`. */
    readonly type?: OboTermType;
    readonly parents?: readonly Reference[];
    /** Genus classes, and differentia as `[relation, filler]` pairs. */
    readonly intersectionOf?: ReadonlyArray<Reference | readonly [Reference, Reference]>;
    readonly unionOf?: readonly Reference[];
    readonly equivalentTo?: readonly Reference[];
    readonly disjointFrom?: readonly Reference[];
    /** `[relation, target]` pairs in file order. */
    readonly relationships?: ReadonlyArray<readonly [Reference, Reference]>;
}

export interface OboTypeDef extends OboStanza {
    /** Metadata tags become annotation properties instead of object properties. */
    readonly isMetadataTag?: boolean;
    readonly comment?: string;
    readonly domain?: Reference;
    readonly range?: Reference;
    readonly holdsOverChain?: ReadonlyArray<readonly Reference[]>;
    readonly isAntiSymmetric?: boolean;
    readonly isCyclic?: boolean;
    readonly isReflexive?: boolean;
    readonly isSymmetric?: boolean;
    readonly isTransitive?: boolean;
    readonly isFunctional?: boolean;
    readonly isInverseFunctional?: boolean;
    readonly parents?: readonly Reference[];
    readonly equivalentTo?: readonly Reference[];
    readonly disjointFrom?: readonly Reference[];
    readonly inverse?: Reference;
    readonly transitiveOver?: readonly Reference[];
    readonly equivalentToChain?: ReadonlyArray<readonly Reference[]>;
    readonly replacedBy?: readonly Reference[];
    readonly seeAlso?: readonly Reference[];
    readonly isClassLevel?: boolean;
}

export interface OboSubsetDef {
    readonly reference: Reference;
    readonly name: string;
}

export interface OboSynonymTypeDef {
    readonly reference: Reference;
    readonly name: string;
    readonly specificity?: SynonymScope;
}

export interface OboOntology {
    /** The ontology prefix, e.g. `go`. */
    readonly ontology: string;
    readonly dataVersion?: string;
    /** Extra CURIE prefixes used by the ontology. */
    readonly idspaces?: PrefixMap;
    readonly rootTerms?: readonly Reference[];
    readonly subsetdefs?: readonly OboSubsetDef[];
    readonly synonymTypedefs?: readonly OboSynonymTypeDef[];
    readonly typedefs?: readonly OboTypeDef[];
    readonly terms?: readonly OboTerm[];
    /** Ontology-level property values. */
    readonly properties?: readonly OboAnnotation[];
}
