/**
 * RDF emission helpers shared by every box.
 */

import { DataFactory, Store } from 'n3';
import type { BlankNode, Literal, NamedNode } from '@rdfjs/types';
import { v4 as uuidv4 } from 'uuid';
import { Converter } from './converter.js';
import { RDF } from './vocabulary.js';

const { blankNode, quad } = DataFactory;

/** A node that can stand in subject position. */
export type Resource = NamedNode | BlankNode;

/** A node that can stand in object position. */
export type RdfNode = Resource | Literal;

/**
 * Everything a box needs to write itself as RDF: the store that receives
 * triples and the converter that expands CURIEs.
 */
export interface EmissionContext {
    readonly store: Store;
    readonly converter: Converter;
}

export function createContext(converter: Converter, store: Store = new Store()): EmissionContext {
    return { store, converter };
}

/** A fresh blank node with a uuid-derived label. */
export function bnode(): BlankNode {
    return blankNode(`b${uuidv4().replace(/-/g, '')}`);
}

export function addQuad(ctx: EmissionContext, subject: Resource, predicate: NamedNode, object: RdfNode): void {
    ctx.store.addQuad(quad(subject, predicate, object));
}

// ── Collections ───────────────────────────────────────────────────

export interface SequenceOptions {
    /** Type every list node as `rdf:List`, as enumerations of literals require. */
    typeConnectorNodes?: boolean;
}

/**
 * Write an RDF collection and return its head, or `rdf:nil` when empty.
 */
export function makeSequence(ctx: EmissionContext, members: readonly RdfNode[], options: SequenceOptions = {}): Resource {
    if (members.length === 0) {
        return RDF.nil;
    }
    const nodes = members.map(() => bnode());
    members.forEach((member, index) => {
        const node = nodes[index];
        addQuad(ctx, node, RDF.first, member);
        addQuad(ctx, node, RDF.rest, index + 1 < nodes.length ? nodes[index + 1] : RDF.nil);
        if (options.typeConnectorNodes) {
            addQuad(ctx, node, RDF.type, RDF.List);
        }
    });
    return nodes[0];
}

/** Order nodes by their string form, comparing code points. */
export function sortNodes<T extends RdfNode>(nodes: readonly T[]): T[] {
    return [...nodes].sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
}

/** Every unordered pair `(a, b)` with `a` before `b` in the input. */
export function pairs<T>(items: readonly T[]): Array<[T, T]> {
    const result: Array<[T, T]> = [];
    for (let i = 0; i < items.length; i++) {
        for (let j = i + 1; j < items.length; j++) {
            result.push([items[i], items[j]]);
        }
    }
    return result;
}
