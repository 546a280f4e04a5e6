/**
 * Primitive boxes: identifiers (CURIEs and IRIs) and literals.
 * Every other box is assembled from these.
 */

import { DataFactory } from 'n3';
import type { Literal, NamedNode } from '@rdfjs/types';
import { Box } from './box.js';
import { BUILTIN_PREFIX_MAP, Converter } from './converter.js';
import { FunctionalSyntaxError, NotImplementedError } from './errors.js';
import { EmissionContext } from './rdf.js';
import { isReferenced, Reference, Referenced } from './reference.js';
import { LanguageTagSchema, safeValidate } from './schemas.js';
import { XSD } from './vocabulary.js';

const { literal, namedNode } = DataFactory;

// ── Hints ─────────────────────────────────────────────────────────

/** Strings are always read as CURIEs; wrap text in a literal to pass it as a value. */
export type IdentifierHint = string | Reference | NamedNode | Referenced;
export type IdentifierBoxOrHint = IdentifierHint | IdentifierBox;

export type LiteralHint = string | number | bigint | boolean | Date | Literal;
export type LiteralBoxOrHint = LiteralHint | LiteralBox;

export type PrimitiveHint = IdentifierBoxOrHint | Exclude<LiteralBoxOrHint, string>;
export type PrimitiveBox = IdentifierBox | LiteralBox;

function isTerm(value: unknown, termType: string): boolean {
    return typeof value === 'object'
        && value !== null
        && 'termType' in value
        && value.termType === termType
        && 'value' in value
        && typeof value.value === 'string';
}

export function isNamedNode(value: unknown): value is NamedNode {
    return isTerm(value, 'NamedNode');
}

export function isLiteral(value: unknown): value is Literal {
    return isTerm(value, 'Literal');
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'object') return value.constructor?.name ?? 'object';
    return typeof value;
}

// ── Identifiers ───────────────────────────────────────────────────

/** A wrapper around a CURIE or a full IRI. */
export class IdentifierBox extends Box {
    readonly identifier: Reference | NamedNode;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        if (identifier instanceof IdentifierBox) {
            this.identifier = identifier.identifier;
        } else if (identifier instanceof Reference) {
            this.identifier = identifier;
        } else if (typeof identifier === 'string') {
            this.identifier = Reference.fromCurie(identifier);
        } else if (isNamedNode(identifier)) {
            this.identifier = identifier;
        } else if (isReferenced(identifier)) {
            this.identifier = new Reference(identifier.reference.prefix, identifier.reference.identifier);
        } else {
            throw new TypeError(`Can not make an identifier from ${describe(identifier)}`);
        }
    }

    toRdf(ctx: EmissionContext): NamedNode {
        if (this.identifier instanceof Reference) {
            return namedNode(ctx.converter.expandReference(this.identifier));
        }
        return this.identifier;
    }

    override toFunowl(): string {
        if (this.identifier instanceof Reference) {
            const curie = this.identifier.curie;
            if (curie.includes('(') || curie.includes(')')) {
                throw new FunctionalSyntaxError(curie, 'CURIEs can not contain parentheses');
            }
            return curie;
        }
        return `<${this.identifier.value}>`;
    }

    toFunowlArgs(): string {
        throw new NotImplementedError('identifiers are written without a tag');
    }
}

// ── Literals ──────────────────────────────────────────────────────

const DATATYPE_CONVERTER = new Converter(Object.entries(BUILTIN_PREFIX_MAP));

function escapeLexical(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** Plain decimal notation, since `xsd:decimal` has no exponent form. */
function decimalLexical(value: number): string {
    const text = String(value);
    const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
    if (match === null) {
        return text;
    }
    const [, sign, lead, fraction = '', exponentText] = match;
    const exponent = Number(exponentText);
    const digits = lead + fraction;
    if (exponent < 0) {
        return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
    }
    const point = exponent + 1;
    return point >= digits.length
        ? `${sign}${digits.padEnd(point, '0')}.0`
        : `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function makeLiteral(value: LiteralHint, language?: string): Literal {
    if (isLiteral(value)) {
        return value;
    }
    switch (typeof value) {
        case 'boolean':
            return literal(value ? 'true' : 'false', XSD.boolean);
        case 'bigint':
            return literal(value.toString(), XSD.integer);
        case 'number':
            if (!Number.isFinite(value)) {
                throw new TypeError(`Unhandled number for literal: ${value}`);
            }
            return Number.isInteger(value)
                ? literal(BigInt(value).toString(), XSD.integer)
                : literal(decimalLexical(value), XSD.decimal);
        case 'string':
            if (language === undefined) {
                return literal(value);
            }
            if (!safeValidate(LanguageTagSchema, language).success) {
                throw new RangeError(`Invalid language tag: ${language}`);
            }
            return literal(value, language);
        default:
            if (value instanceof Date) {
                return literal(value.toISOString(), XSD.dateTime);
            }
            throw new TypeError(`Unhandled type for literal: ${describe(value)}`);
    }
}

/** A wrapper around an RDF literal. */
export class LiteralBox extends Box {
    readonly literal: Literal;

    constructor(value: LiteralBoxOrHint, language?: string) {
        super();
        this.literal = value instanceof LiteralBox ? value.literal : makeLiteral(value, language);
    }

    /** A calendar date, typed `xsd:date`. */
    static date(value: Date): LiteralBox {
        return new LiteralBox(literal(value.toISOString().slice(0, 10), XSD.date));
    }

    toRdf(_ctx: EmissionContext): Literal {
        return this.literal;
    }

    override toFunowl(): string {
        const lexical = `"${escapeLexical(this.literal.value)}"`;
        if (this.literal.language) {
            return `${lexical}@${this.literal.language}`;
        }
        const datatype = this.literal.datatype.value;
        if (datatype === XSD.string.value) {
            return lexical;
        }
        return `${lexical}^^${DATATYPE_CONVERTER.compress(datatype) ?? `<${datatype}>`}`;
    }

    toFunowlArgs(): string {
        throw new NotImplementedError('literals are written without a tag');
    }
}

/**
 * Box a value: strings become identifiers, other scalars and RDF literals
 * become literals.
 */
export function primitiveBox(value: PrimitiveHint | LiteralBox): PrimitiveBox {
    if (value instanceof IdentifierBox || value instanceof LiteralBox) {
        return value;
    }
    if (isLiteral(value)) {
        return new LiteralBox(value);
    }
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean' || value instanceof Date) {
        return new LiteralBox(value);
    }
    return new IdentifierBox(value);
}

/** Get a literal. */
export function l(value: LiteralHint, language?: string): Literal {
    return makeLiteral(value, language);
}
