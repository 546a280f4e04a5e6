/**
 * Ontologies and the documents that hold them.
 *
 * A {@link Document} is what gets written to disk: the prefix declarations
 * followed by one or more {@link Ontology} blocks.
 */

import { writeFile } from 'node:fs/promises';
import { DataFactory, Store, Writer } from 'n3';
import type { NamedNode } from '@rdfjs/types';
import { Annotation } from './annotations.js';
import { Axiom } from './axioms.js';
import { Box, listToFunowl } from './box.js';
import { BUILTIN_PREFIX_MAP, Converter, DEFAULT_PREFIX_MAP, PrefixMap } from './converter.js';
import { NotImplementedError } from './errors.js';
import { logger } from './logger.js';
import { Macro } from './macros.js';
import { addQuad, bnode, createContext, EmissionContext, Resource } from './rdf.js';
import { OntologyHeaderSchema, validate } from './schemas.js';
import { OWL, RDF } from './vocabulary.js';

const { namedNode } = DataFactory;

/** Anything that can stand in an ontology's axiom list. */
export type OntologyAxiom = Axiom | Macro;

export const EXAMPLE_ONTOLOGY_IRI = 'https://example.org/example.ofn';

// ── Header parts ──────────────────────────────────────────────────

/** `Prefix(obo:=<http://purl.obolibrary.org/obo/>)` */
export class Prefix extends Box {
    readonly prefix: string;
    readonly uriPrefix: string;

    constructor(prefix: string, uriPrefix: string) {
        super();
        this.prefix = prefix;
        this.uriPrefix = uriPrefix;
    }

    /** Prefixes only scope CURIEs; they contribute nothing to the graph. */
    toRdf(_ctx: EmissionContext): never {
        throw new NotImplementedError(`prefix ${this.prefix} has no RDF node; the document converter applies it`);
    }

    toFunowlArgs(): string {
        return `${this.prefix}:=<${this.uriPrefix}>`;
    }
}

/** `Import(<http://purl.obolibrary.org/obo/bfo.owl>)` */
export class Import extends Box {
    readonly iri: string;

    constructor(iri: string) {
        super();
        this.iri = iri;
    }

    toRdf(_ctx: EmissionContext): NamedNode {
        return namedNode(this.iri);
    }

    toFunowlArgs(): string {
        return `<${this.iri}>`;
    }
}

// ── Ontology ──────────────────────────────────────────────────────

export interface OntologyOptions {
    iri?: string;
    /** Only written when there is also an IRI. */
    versionIri?: string;
    imports?: ReadonlyArray<Import | string>;
    annotations?: readonly Annotation[];
    axioms?: readonly OntologyAxiom[];
}

export class Ontology extends Box {
    readonly iri?: string;
    readonly versionIri?: string;
    readonly imports: readonly Import[];
    readonly annotations: readonly Annotation[];
    readonly axioms: readonly OntologyAxiom[];

    constructor(options: OntologyOptions = {}) {
        super();
        const imports = options.imports ?? [];
        validate(OntologyHeaderSchema, {
            iri: options.iri,
            versionIri: options.versionIri,
            imports: imports.map((i) => (typeof i === 'string' ? i : i.iri)),
        });
        this.iri = options.iri;
        this.versionIri = options.versionIri;
        this.imports = imports.map((i) => (typeof i === 'string' ? new Import(i) : i));
        this.annotations = options.annotations ?? [];
        this.axioms = options.axioms ?? [];
    }

    /** Writes the header onto the ontology node (the IRI, or a blank node), then every axiom. */
    toRdf(ctx: EmissionContext): Resource {
        const node = this.iri === undefined ? bnode() : namedNode(this.iri);
        addQuad(ctx, node, RDF.type, OWL.Ontology);
        if (this.iri !== undefined && this.versionIri !== undefined) {
            addQuad(ctx, node, OWL.versionIRI, namedNode(this.versionIri));
        }
        for (const imported of this.imports) {
            addQuad(ctx, node, OWL.imports, imported.toRdf(ctx));
        }
        for (const annotation of this.annotations) {
            annotation.addTo(ctx, node);
        }
        for (const axiom of this.axioms) {
            axiom.toRdf(ctx);
        }
        return node;
    }

    override toFunowl(): string {
        return `${this.tag}(${this.toFunowlArgs()}\n)`;
    }

    toFunowlArgs(): string {
        let header = '';
        if (this.iri !== undefined) {
            header = `<${this.iri}>`;
            if (this.versionIri !== undefined) {
                header += ` <${this.versionIri}>`;
            }
        }
        const parts: Array<readonly Box[]> = [this.imports, this.annotations, this.axioms].filter((part) => part.length > 0);
        return `${header}\n${parts.map((part) => listToFunowl(part, '\n')).join('\n\n')}`;
    }
}

// ── Document ──────────────────────────────────────────────────────

function compareCaseless(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
}

function isPrefixList(prefixes: PrefixMap | readonly Prefix[]): prefixes is readonly Prefix[] {
    return Array.isArray(prefixes);
}

function isOntologyList(ontologies: Ontology | readonly Ontology[]): ontologies is readonly Ontology[] {
    return Array.isArray(ontologies);
}

/**
 * A functional OWL document.
 *
 * ```ts
 * const document = new Document(new Ontology({ iri, axioms }), { a: 'https://example.org/a:' });
 * document.toFunowl();
 * await document.toTurtle();
 * ```
 *
 * Prefix maps are sorted case-insensitively; a list of {@link Prefix} keeps
 * its order. RDF output works for a document with exactly one ontology.
 */
export class Document {
    readonly ontologies: readonly Ontology[];
    readonly prefixes: readonly Prefix[];

    constructor(ontologies: Ontology | readonly Ontology[], prefixes: PrefixMap | readonly Prefix[]) {
        this.ontologies = isOntologyList(ontologies) ? ontologies : [ontologies];
        this.prefixes = isPrefixList(prefixes)
            ? prefixes
            : Object.entries(prefixes)
                .sort(([a], [b]) => compareCaseless(a, b))
                .map(([prefix, uriPrefix]) => new Prefix(prefix, uriPrefix));
    }

    get prefixMap(): PrefixMap {
        return Object.fromEntries(this.prefixes.map((p) => [p.prefix, p.uriPrefix]));
    }

    /** The document's own prefixes, then the ones every document gets for free. */
    get converter(): Converter {
        return Converter.chain([
            new Converter(this.prefixes.map((p) => [p.prefix, p.uriPrefix] as const)),
            new Converter(Object.entries(BUILTIN_PREFIX_MAP)),
        ]);
    }

    toFunowl(): string {
        const prefixes = listToFunowl(this.prefixes, '\n');
        const ontologies = this.ontologies.map((ontology) => ontology.toFunowl()).join('\n\n');
        logger.debug('serialized document as functional OWL', {
            ontologies: this.ontologies.length,
            axioms: this.ontologies.reduce((total, ontology) => total + ontology.axioms.length, 0),
        });
        return `${prefixes}\n\n${ontologies}`;
    }

    /**
     * @throws RangeError unless the document holds exactly one ontology
     */
    toRdf(): Store {
        if (this.ontologies.length !== 1) {
            throw new RangeError(`Can only export one ontology to RDF, got ${this.ontologies.length}`);
        }
        const ctx = createContext(this.converter);
        for (const ontology of this.ontologies) {
            ontology.toRdf(ctx);
        }
        logger.debug('built RDF graph', { triples: ctx.store.size });
        return ctx.store;
    }

    toTurtle(): Promise<string> {
        return serializeStore(this.toRdf(), this.converter.prefixMap, 'Turtle');
    }

    toNTriples(): Promise<string> {
        return serializeStore(this.toRdf(), {}, 'N-Triples');
    }

    async writeFunowl(path: string): Promise<void> {
        await writeFile(path, this.toFunowl(), 'utf-8');
    }

    async writeRdf(path: string): Promise<void> {
        await writeFile(path, await this.toTurtle(), 'utf-8');
    }
}

/** Write a store with the n3 writer. */
export function serializeStore(store: Store, prefixes: PrefixMap, format: 'Turtle' | 'N-Triples'): Promise<string> {
    const writer = new Writer({ prefixes, format });
    writer.addQuads(store.getQuads(null, null, null, null));
    return new Promise((resolve, reject) => {
        writer.end((error: Error | null, result: string) => {
            if (error) {
                reject(error);
            } else {
                resolve(result);
            }
        });
    });
}

// ── Shortcuts ─────────────────────────────────────────────────────

export interface WriteOntologyOptions extends OntologyOptions {
    prefixes: PrefixMap | readonly Prefix[];
}

/** Write a single-ontology document as functional OWL. */
export async function writeOntology(path: string, options: WriteOntologyOptions): Promise<void> {
    const { prefixes, ...ontology } = options;
    await new Document(new Ontology(ontology), prefixes).writeFunowl(path);
}

/**
 * The RDF for some boxes inside the example ontology. CURIEs expand through
 * `prefixMap` first, then {@link DEFAULT_PREFIX_MAP}.
 */
export function getRdfGraph(boxes: readonly Box[], prefixMap: PrefixMap): Store {
    const converter = Converter.chain([Converter.fromPrefixMap(prefixMap), new Converter(Object.entries(DEFAULT_PREFIX_MAP))]);
    const ctx = createContext(converter);
    addQuad(ctx, namedNode(EXAMPLE_ONTOLOGY_IRI), RDF.type, OWL.Ontology);
    for (const box of boxes) {
        box.toRdf(ctx);
    }
    return ctx.store;
}
