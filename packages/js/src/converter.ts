/**
 * Prefix maps and CURIE/IRI conversion.
 */

import { Reference } from './reference.js';
import { PrefixMapSchema, validate } from './schemas.js';
import { OWL_NS, RDF_NS, RDFS_NS, XSD_NS } from './vocabulary.js';

export type PrefixMap = Record<string, string>;

// ── Prefix maps ───────────────────────────────────────────────────

/** Prefixes that functional-style syntax predefines for every document. */
export const BUILTIN_PREFIX_MAP: Readonly<PrefixMap> = {
    owl: OWL_NS,
    rdf: RDF_NS,
    rdfs: RDFS_NS,
    xsd: XSD_NS,
};

/** Prefixes used by the macros and the OBO adapter. */
export const DEFAULT_PREFIX_MAP: Readonly<PrefixMap> = {
    dcterms: 'http://purl.org/dc/terms/',
    IAO: 'http://purl.obolibrary.org/obo/IAO_',
    obo: 'http://purl.obolibrary.org/obo/',
    oboInOwl: 'http://www.geneontology.org/formats/oboInOwl#',
    OMO: 'http://purl.obolibrary.org/obo/OMO_',
    owl: OWL_NS,
    rdf: RDF_NS,
    rdfs: RDFS_NS,
    semapv: 'https://w3id.org/semapv/vocab/',
    skos: 'http://www.w3.org/2004/02/skos/core#',
    sssom: 'https://w3id.org/sssom/',
    xsd: XSD_NS,
};

export const EXAMPLE_PREFIX_MAP: Readonly<PrefixMap> = {
    a: 'https://example.org/a:',
    dcterms: 'http://purl.org/dc/terms/',
    orcid: 'https://orcid.org/',
};

// ── Converter ─────────────────────────────────────────────────────

/**
 * Expands CURIEs to IRIs and compresses IRIs back to CURIEs.
 * When two entries share a prefix, the first one wins.
 */
export class Converter {
    private readonly prefixes = new Map<string, string>();

    constructor(entries: Iterable<readonly [string, string]> = []) {
        for (const [prefix, uriPrefix] of entries) {
            if (!this.prefixes.has(prefix)) {
                this.prefixes.set(prefix, uriPrefix);
            }
        }
    }

    static fromPrefixMap(prefixMap: PrefixMap): Converter {
        return new Converter(Object.entries(validate(PrefixMapSchema, prefixMap)));
    }

    /** Combine converters; earlier converters take priority. */
    static chain(converters: readonly Converter[]): Converter {
        return new Converter(converters.flatMap((converter) => [...converter.prefixes]));
    }

    get prefixMap(): PrefixMap {
        return Object.fromEntries(this.prefixes);
    }

    has(prefix: string): boolean {
        return this.prefixes.has(prefix);
    }

    expand(curie: string): string | undefined {
        const index = curie.indexOf(':');
        if (index < 0) return undefined;
        const uriPrefix = this.prefixes.get(curie.slice(0, index));
        return uriPrefix === undefined ? undefined : uriPrefix + curie.slice(index + 1);
    }

    /** @throws RangeError when the prefix is not registered */
    expandStrict(curie: string): string {
        const iri = this.expand(curie);
        if (iri === undefined) {
            throw new RangeError(`Could not expand ${curie}: unknown prefix`);
        }
        return iri;
    }

    expandReference(reference: Reference): string {
        return this.expandStrict(reference.curie);
    }

    /** Compress with the longest matching URI prefix. */
    compress(iri: string): string | undefined {
        let best: [string, string] | undefined;
        for (const [prefix, uriPrefix] of this.prefixes) {
            if (iri.startsWith(uriPrefix) && (best === undefined || uriPrefix.length > best[1].length)) {
                best = [prefix, uriPrefix];
            }
        }
        return best === undefined ? undefined : `${best[0]}:${iri.slice(best[1].length)}`;
    }
}
