/**
 * Annotations and the reification of annotated triples.
 *
 * An annotated triple `s p o` is written as the triple itself plus a blank
 * node pointing back at it, which the annotations then hang off:
 *
 *     _:r a owl:Axiom ;
 *         owl:annotatedSource s ; owl:annotatedProperty p ; owl:annotatedTarget o ;
 *         dcterms:contributor orcid:0000-0003-4423-4370 .
 */

import type { BlankNode, NamedNode } from '@rdfjs/types';
import { Box, listToFunowl } from './box.js';
import { NotImplementedError } from './errors.js';
import { IdentifierBox, IdentifierBoxOrHint, PrimitiveBox, primitiveBox, PrimitiveHint } from './primitives.js';
import { addQuad, bnode, EmissionContext, RdfNode, Resource } from './rdf.js';
import { BUILTIN_ANNOTATION_PROPERTIES, OWL, RDF } from './vocabulary.js';

// ── Annotation properties ─────────────────────────────────────────

/** An annotation property, typed `owl:AnnotationProperty` unless it is built in. */
export class AnnotationProperty extends Box {
    readonly box: IdentifierBox;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        this.box = new IdentifierBox(identifier);
    }

    get identifier() {
        return this.box.identifier;
    }

    toRdf(ctx: EmissionContext): NamedNode {
        const node = this.box.toRdf(ctx);
        if (!BUILTIN_ANNOTATION_PROPERTIES.has(node.value)) {
            addQuad(ctx, node, RDF.type, OWL.AnnotationProperty);
        }
        return node;
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

// ── Annotations ───────────────────────────────────────────────────

/**
 * A property/value pair attached to an axiom, an ontology or another
 * annotation. Nesting may go to any depth:
 *
 * ```ts
 * new Annotation('dcterms:contributor', 'orcid:0000-0003-4423-4370', [
 *     new Annotation('wd:P1416', 'wd:Q126066280'),
 * ]);
 * ```
 */
export class Annotation extends Box {
    readonly annotationProperty: AnnotationProperty;
    readonly value: PrimitiveBox;
    readonly annotations: readonly Annotation[];

    constructor(annotationProperty: IdentifierBoxOrHint, value: PrimitiveHint, annotations: readonly Annotation[] = []) {
        super();
        this.annotationProperty = new AnnotationProperty(annotationProperty);
        this.value = primitiveBox(value);
        this.annotations = annotations;
    }

    /** Annotations only exist attached to something; see {@link addTo}. */
    toRdf(_ctx: EmissionContext): never {
        throw new NotImplementedError('an annotation has no node of its own, attach it with addTo()');
    }

    /** Attach this annotation to `node`, reifying it when it is annotated itself. */
    addTo(ctx: EmissionContext, node: Resource): void {
        const property = this.annotationProperty.toRdf(ctx);
        const value = this.value.toRdf(ctx);
        addQuad(ctx, node, property, value);
        reifyTriple(ctx, node, property, value, { annotations: this.annotations, type: OWL.Annotation });
    }

    toFunowlArgs(): string {
        const end = `${this.annotationProperty.toFunowl()} ${this.value.toFunowl()}`;
        return this.annotations.length > 0 ? `${listToFunowl(this.annotations)} ${end}` : end;
    }
}

// ── Reification ───────────────────────────────────────────────────

/** The three predicates that point a reification node at its triple. */
export type ReificationPredicates = readonly [source: NamedNode, property: NamedNode, target: NamedNode];

export const AXIOM_PREDICATES: ReificationPredicates = [OWL.annotatedSource, OWL.annotatedProperty, OWL.annotatedTarget];

export interface ReificationOptions {
    annotations?: readonly Annotation[];
    /** Type of the reification node, `owl:Axiom` unless given. */
    type?: NamedNode;
    /** Reify even without annotations. */
    force?: boolean;
    predicates?: ReificationPredicates;
}

/**
 * Write the reification node for `s p o` and attach the annotations to it.
 * Returns `undefined` when there is nothing to attach and `force` is unset.
 */
export function reifyTriple(
    ctx: EmissionContext,
    subject: Resource,
    predicate: Resource,
    object: RdfNode,
    options: ReificationOptions = {},
): BlankNode | undefined {
    const { annotations = [], type = OWL.Axiom, force = false, predicates = AXIOM_PREDICATES } = options;
    if (annotations.length === 0 && !force) {
        return undefined;
    }
    const [source, property, target] = predicates;
    const node = bnode();
    addQuad(ctx, node, RDF.type, type);
    addQuad(ctx, node, source, subject);
    addQuad(ctx, node, property, predicate);
    addQuad(ctx, node, target, object);
    for (const annotation of annotations) {
        annotation.addTo(ctx, node);
    }
    return node;
}

/** Add `s p o`, reified when annotated. */
export function addTriple(
    ctx: EmissionContext,
    subject: Resource,
    predicate: NamedNode,
    object: RdfNode,
    annotations: readonly Annotation[] = [],
): BlankNode | undefined {
    addQuad(ctx, subject, predicate, object);
    return reifyTriple(ctx, subject, predicate, object, { annotations });
}
