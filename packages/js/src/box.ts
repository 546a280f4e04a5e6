/**
 * The base class shared by every construct of the DSL.
 */

import { EmissionContext, RdfNode } from './rdf.js';

/**
 * Something that can be written both as an RDF node and as
 * functional-style syntax. Boxes never mutate anything besides
 * the store of the context they are given.
 */
export abstract class Box {
    /** Write triples into `ctx.store` and return the node standing for this box. */
    abstract toRdf(ctx: EmissionContext): RdfNode;

    /** The inside of the functional OWL tag. */
    abstract toFunowlArgs(): string;

    /** The functional OWL tag, taken from the class name. */
    get tag(): string {
        return this.constructor.name;
    }

    toFunowl(): string {
        return `${this.tag}(${this.toFunowlArgs()})`;
    }
}

export function listToFunowl(elements: Iterable<Box>, separator = ' '): string {
    return Array.from(elements, (element) => element.toFunowl()).join(separator);
}
