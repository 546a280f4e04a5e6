/**
 * Compact references to ontology entities.
 */

import { CurieSchema, safeValidate } from './schemas.js';

/**
 * A namespaced identifier: a CURIE prefix, a local identifier and an optional
 * display name. The name never takes part in equality or serialization.
 */
export class Reference {
    readonly prefix: string;
    readonly identifier: string;
    readonly name?: string;

    constructor(prefix: string, identifier: string, name?: string) {
        this.prefix = prefix;
        this.identifier = identifier;
        this.name = name;
    }

    get curie(): string {
        return `${this.prefix}:${this.identifier}`;
    }

    /**
     * Parse a CURIE, splitting on the first colon.
     *
     * @throws RangeError when the string is not a CURIE
     */
    static fromCurie(curie: string, name?: string): Reference {
        const result = safeValidate(CurieSchema, curie);
        if (!result.success) {
            throw new RangeError(`Invalid CURIE ${JSON.stringify(curie)}: ${result.error.issues[0]?.message ?? 'malformed'}`);
        }
        const index = curie.indexOf(':');
        return new Reference(curie.slice(0, index), curie.slice(index + 1), name);
    }

    equals(other: Reference): boolean {
        return this.prefix === other.prefix && this.identifier === other.identifier;
    }

    toString(): string {
        return this.curie;
    }
}

/** Anything that carries a reference, such as an OBO term or type definition. */
export interface Referenced {
    readonly reference: Reference;
}

export function isReferenced(value: unknown): value is Referenced {
    return typeof value === 'object'
        && value !== null
        && 'reference' in value
        && value.reference instanceof Reference;
}

/** Get a reference from a CURIE. */
export function c(curie: string): Reference {
    return Reference.fromCurie(curie);
}
