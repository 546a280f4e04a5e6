/**
 * Property expressions, data ranges and class expressions.
 *
 * Each category is an abstract class with a closed set of subclasses and a
 * single `safe` coercion that turns identifier hints into the simple case.
 */

import { DataFactory } from 'n3';
import type { BlankNode, NamedNode } from '@rdfjs/types';
import { Box, listToFunowl } from './box.js';
import { NotImplementedError } from './errors.js';
import {
    IdentifierBox,
    IdentifierBoxOrHint,
    LiteralBox,
    LiteralBoxOrHint,
} from './primitives.js';
import { addQuad, bnode, EmissionContext, makeSequence, RdfNode, Resource, sortNodes } from './rdf.js';
import { CardinalitySchema, safeValidate } from './schemas.js';
import {
    BUILTIN_CLASSES,
    BUILTIN_DATA_PROPERTIES,
    BUILTIN_OBJECT_PROPERTIES,
    isBuiltinDatatype,
    OWL,
    RDF,
    RDFS,
    XSD,
} from './vocabulary.js';

const { literal } = DataFactory;

/** Type `node` unless it is one of the skipped built-ins. */
function declareUnlessBuiltin(ctx: EmissionContext, node: NamedNode, type: NamedNode, isBuiltin: (iri: string) => boolean): NamedNode {
    if (!isBuiltin(node.value)) {
        addQuad(ctx, node, RDF.type, type);
    }
    return node;
}

function requireAtLeast<T>(items: readonly T[], minimum: number, what: string): readonly T[] {
    if (items.length < minimum) {
        throw new RangeError(`${what} requires at least ${minimum}, got ${items.length}`);
    }
    return items;
}

// ── Object property expressions ───────────────────────────────────

export abstract class ObjectPropertyExpression extends Box {
    abstract override toRdf(ctx: EmissionContext): Resource;

    static safe(ope: ObjectPropertyExpression | IdentifierBoxOrHint): ObjectPropertyExpression {
        return ope instanceof ObjectPropertyExpression ? ope : new SimpleObjectPropertyExpression(ope);
    }
}

/** A named object property. */
export class SimpleObjectPropertyExpression extends ObjectPropertyExpression {
    readonly box: IdentifierBox;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        this.box = new IdentifierBox(identifier);
    }

    get identifier() {
        return this.box.identifier;
    }

    /** The IRI alone, without an `owl:ObjectProperty` declaration. */
    toIri(ctx: EmissionContext): NamedNode {
        return this.box.toRdf(ctx);
    }

    toRdf(ctx: EmissionContext): NamedNode {
        return declareUnlessBuiltin(ctx, this.toIri(ctx), OWL.ObjectProperty, (iri) => BUILTIN_OBJECT_PROPERTIES.has(iri));
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

/**
 * The inverse of a named object property, `ObjectInverseOf(a:fatherOf)`.
 *
 * Its RDF node is a blank node pointing at the bare property IRI. The callers
 * that also need the property declared use {@link declareWrapped}; object
 * cardinalities, sub-property axioms and negative assertions do, other
 * restrictions do not.
 */
export class ObjectInverseOf extends ObjectPropertyExpression {
    readonly objectPropertyExpression: SimpleObjectPropertyExpression;

    constructor(objectPropertyExpression: SimpleObjectPropertyExpression | IdentifierBoxOrHint) {
        super();
        if (objectPropertyExpression instanceof SimpleObjectPropertyExpression) {
            this.objectPropertyExpression = objectPropertyExpression;
        } else if (objectPropertyExpression instanceof ObjectPropertyExpression) {
            throw new TypeError('ObjectInverseOf can only wrap a named object property');
        } else {
            this.objectPropertyExpression = new SimpleObjectPropertyExpression(objectPropertyExpression);
        }
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, OWL.inverseOf, this.objectPropertyExpression.toIri(ctx));
        return node;
    }

    /** Declare the wrapped property as an `owl:ObjectProperty`. */
    declareWrapped(ctx: EmissionContext): NamedNode {
        return this.objectPropertyExpression.toRdf(ctx);
    }

    toFunowlArgs(): string {
        return this.objectPropertyExpression.toFunowl();
    }
}

// ── Data property expressions ─────────────────────────────────────

export abstract class DataPropertyExpression extends Box {
    abstract override toRdf(ctx: EmissionContext): NamedNode;

    static safe(dpe: DataPropertyExpression | IdentifierBoxOrHint): DataPropertyExpression {
        return dpe instanceof DataPropertyExpression ? dpe : new SimpleDataPropertyExpression(dpe);
    }
}

export class SimpleDataPropertyExpression extends DataPropertyExpression {
    readonly box: IdentifierBox;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        this.box = new IdentifierBox(identifier);
    }

    get identifier() {
        return this.box.identifier;
    }

    toRdf(ctx: EmissionContext): NamedNode {
        return declareUnlessBuiltin(ctx, this.box.toRdf(ctx), OWL.DatatypeProperty, (iri) => BUILTIN_DATA_PROPERTIES.has(iri));
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

// ── Data ranges ───────────────────────────────────────────────────

export abstract class DataRange extends Box {
    abstract override toRdf(ctx: EmissionContext): Resource;

    static safe(dataRange: DataRange | IdentifierBoxOrHint): DataRange {
        return dataRange instanceof DataRange ? dataRange : new SimpleDataRange(dataRange);
    }
}

/** A named datatype such as `xsd:integer`. */
export class SimpleDataRange extends DataRange {
    readonly box: IdentifierBox;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        this.box = new IdentifierBox(identifier);
    }

    get identifier() {
        return this.box.identifier;
    }

    toRdf(ctx: EmissionContext): NamedNode {
        return declareUnlessBuiltin(ctx, this.box.toRdf(ctx), RDFS.Datatype, isBuiltinDatatype);
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

abstract class DataRangeList extends DataRange {
    protected abstract readonly predicate: NamedNode;
    readonly dataRanges: readonly DataRange[];

    constructor(dataRanges: ReadonlyArray<DataRange | IdentifierBoxOrHint>) {
        super();
        this.dataRanges = requireAtLeast(dataRanges, 2, this.tag).map((dr) => DataRange.safe(dr));
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, RDFS.Datatype);
        addQuad(ctx, node, this.predicate, makeSequence(ctx, this.dataRanges.map((dr) => dr.toRdf(ctx))));
        return node;
    }

    toFunowlArgs(): string {
        return listToFunowl(this.dataRanges);
    }
}

/** `DataIntersectionOf(xsd:nonNegativeInteger xsd:nonPositiveInteger)` contains exactly 0. */
export class DataIntersectionOf extends DataRangeList {
    protected readonly predicate = OWL.intersectionOf;
}

export class DataUnionOf extends DataRangeList {
    protected readonly predicate = OWL.unionOf;
}

export class DataComplementOf extends DataRange {
    readonly dataRange: DataRange;

    constructor(dataRange: DataRange | IdentifierBoxOrHint) {
        super();
        this.dataRange = DataRange.safe(dataRange);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, RDFS.Datatype);
        addQuad(ctx, node, OWL.datatypeComplementOf, this.dataRange.toRdf(ctx));
        return node;
    }

    toFunowlArgs(): string {
        return this.dataRange.toFunowl();
    }
}

/**
 * An enumeration of literals. Strings here are text, not CURIEs:
 * `new DataOneOf(['Peter', 1])` is `DataOneOf("Peter" "1"^^xsd:integer)`.
 */
export class DataOneOf extends DataRange {
    readonly literals: readonly LiteralBox[];

    constructor(literals: readonly LiteralBoxOrHint[]) {
        super();
        this.literals = requireAtLeast(literals, 1, 'DataOneOf').map((value) => new LiteralBox(value));
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        const members = this.literals.map((value) => value.toRdf(ctx));
        addQuad(ctx, node, RDF.type, RDFS.Datatype);
        addQuad(ctx, node, OWL.oneOf, makeSequence(ctx, members, { typeConnectorNodes: true }));
        return node;
    }

    toFunowlArgs(): string {
        return listToFunowl(this.literals);
    }
}

export type FacetRestriction = readonly [IdentifierBoxOrHint, LiteralBoxOrHint];

/** `DatatypeRestriction(xsd:integer xsd:minInclusive "5"^^xsd:integer)` */
export class DatatypeRestriction extends DataRange {
    readonly datatype: IdentifierBox;
    readonly restrictions: ReadonlyArray<readonly [IdentifierBox, LiteralBox]>;

    constructor(datatype: IdentifierBoxOrHint, restrictions: readonly FacetRestriction[]) {
        super();
        this.datatype = new IdentifierBox(datatype);
        this.restrictions = requireAtLeast(restrictions, 1, 'DatatypeRestriction')
            .map(([facet, value]) => [new IdentifierBox(facet), new LiteralBox(value)] as const);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, RDFS.Datatype);
        addQuad(ctx, node, OWL.onDatatype, this.datatype.toRdf(ctx));
        const facets = this.restrictions.map(([facet, value]) => {
            const facetNode = bnode();
            addQuad(ctx, facetNode, facet.toRdf(ctx), value.toRdf(ctx));
            return facetNode;
        });
        addQuad(ctx, node, OWL.withRestrictions, makeSequence(ctx, facets));
        return node;
    }

    toFunowlArgs(): string {
        const facets = this.restrictions.map(([facet, value]) => `${facet.toFunowl()} ${value.toFunowl()}`);
        return [this.datatype.toFunowl(), ...facets].join(' ');
    }
}

// ── Class expressions ─────────────────────────────────────────────

export abstract class ClassExpression extends Box {
    abstract override toRdf(ctx: EmissionContext): Resource;

    static safe(classExpression: ClassExpression | IdentifierBoxOrHint): ClassExpression {
        return classExpression instanceof ClassExpression ? classExpression : new SimpleClassExpression(classExpression);
    }
}

/** A named class. */
export class SimpleClassExpression extends ClassExpression {
    readonly box: IdentifierBox;

    constructor(identifier: IdentifierBoxOrHint) {
        super();
        this.box = new IdentifierBox(identifier);
    }

    get identifier() {
        return this.box.identifier;
    }

    toRdf(ctx: EmissionContext): NamedNode {
        return declareUnlessBuiltin(ctx, this.box.toRdf(ctx), OWL.Class, (iri) => BUILTIN_CLASSES.has(iri));
    }

    override toFunowl(): string {
        return this.box.toFunowl();
    }

    toFunowlArgs(): string {
        return this.box.toFunowlArgs();
    }
}

abstract class ClassExpressionList extends ClassExpression {
    protected abstract readonly predicate: NamedNode;
    readonly classExpressions: readonly ClassExpression[];

    constructor(classExpressions: ReadonlyArray<ClassExpression | IdentifierBoxOrHint>) {
        super();
        this.classExpressions = requireAtLeast(classExpressions, 2, this.tag).map((ce) => ClassExpression.safe(ce));
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, OWL.Class);
        addQuad(ctx, node, this.predicate, makeSequence(ctx, this.classExpressions.map((ce) => ce.toRdf(ctx))));
        return node;
    }

    toFunowlArgs(): string {
        return listToFunowl(this.classExpressions);
    }
}

/** `ObjectIntersectionOf(a:Dog a:CanTalk)` describes all dogs that can talk. */
export class ObjectIntersectionOf extends ClassExpressionList {
    protected readonly predicate = OWL.intersectionOf;
}

export class ObjectUnionOf extends ClassExpressionList {
    protected readonly predicate = OWL.unionOf;
}

export class ObjectComplementOf extends ClassExpression {
    readonly classExpression: ClassExpression;

    constructor(classExpression: ClassExpression | IdentifierBoxOrHint) {
        super();
        this.classExpression = ClassExpression.safe(classExpression);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, OWL.Class);
        addQuad(ctx, node, OWL.complementOf, this.classExpression.toRdf(ctx));
        return node;
    }

    toFunowlArgs(): string {
        return this.classExpression.toFunowl();
    }
}

/**
 * An enumeration of individuals. In RDF the members are typed
 * `owl:NamedIndividual` and listed in sorted order.
 */
export class ObjectOneOf extends ClassExpression {
    readonly individuals: readonly IdentifierBox[];

    constructor(individuals: readonly IdentifierBoxOrHint[]) {
        super();
        this.individuals = requireAtLeast(individuals, 2, 'ObjectOneOf').map((i) => new IdentifierBox(i));
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const members = this.individuals.map((individual) => {
            const node = individual.toRdf(ctx);
            addQuad(ctx, node, RDF.type, OWL.NamedIndividual);
            return node;
        });
        const node = bnode();
        addQuad(ctx, node, RDF.type, OWL.Class);
        addQuad(ctx, node, OWL.oneOf, makeSequence(ctx, sortNodes(members)));
        return node;
    }

    toFunowlArgs(): string {
        return listToFunowl(this.individuals);
    }
}

// ── Restrictions ──────────────────────────────────────────────────

/** A blank `owl:Restriction` on `property` with one more predicate/object pair. */
function restriction(ctx: EmissionContext, property: Resource, predicate: NamedNode, target: RdfNode): BlankNode {
    const node = bnode();
    addQuad(ctx, node, RDF.type, OWL.Restriction);
    addQuad(ctx, node, OWL.onProperty, property);
    addQuad(ctx, node, predicate, target);
    return node;
}

abstract class ObjectValuesFrom extends ClassExpression {
    protected abstract readonly predicate: NamedNode;
    readonly objectPropertyExpression: ObjectPropertyExpression;
    readonly classExpression: ClassExpression;

    constructor(
        objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint,
        classExpression: ClassExpression | IdentifierBoxOrHint,
    ) {
        super();
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
        this.classExpression = ClassExpression.safe(classExpression);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const property = this.objectPropertyExpression.toRdf(ctx);
        return restriction(ctx, property, this.predicate, this.classExpression.toRdf(ctx));
    }

    toFunowlArgs(): string {
        return `${this.objectPropertyExpression.toFunowl()} ${this.classExpression.toFunowl()}`;
    }
}

/** `ObjectSomeValuesFrom(RO:0002160 NCBITaxon:9606)` */
export class ObjectSomeValuesFrom extends ObjectValuesFrom {
    protected readonly predicate = OWL.someValuesFrom;
}

export class ObjectAllValuesFrom extends ObjectValuesFrom {
    protected readonly predicate = OWL.allValuesFrom;
}

export class ObjectHasValue extends ClassExpression {
    readonly objectPropertyExpression: ObjectPropertyExpression;
    readonly individual: IdentifierBox;

    constructor(objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint, individual: IdentifierBoxOrHint) {
        super();
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
        this.individual = new IdentifierBox(individual);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const property = this.objectPropertyExpression.toRdf(ctx);
        return restriction(ctx, property, OWL.hasValue, this.individual.toRdf(ctx));
    }

    toFunowlArgs(): string {
        return `${this.objectPropertyExpression.toFunowl()} ${this.individual.toFunowl()}`;
    }
}

export class ObjectHasSelf extends ClassExpression {
    readonly objectPropertyExpression: ObjectPropertyExpression;

    constructor(objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint) {
        super();
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        const property = this.objectPropertyExpression.toRdf(ctx);
        return restriction(ctx, property, OWL.hasSelf, literal('true', XSD.boolean));
    }

    toFunowlArgs(): string {
        return this.objectPropertyExpression.toFunowl();
    }
}

// ── Data restrictions ─────────────────────────────────────────────

export type DataPropertyExpressions =
    | DataPropertyExpression
    | IdentifierBoxOrHint
    | ReadonlyArray<DataPropertyExpression | IdentifierBoxOrHint>;

function isList<T>(value: T | ReadonlyArray<T>): value is ReadonlyArray<T> {
    return Array.isArray(value);
}

function toDataPropertyExpressions(dpes: DataPropertyExpressions): DataPropertyExpression[] {
    const list = isList(dpes) ? dpes : [dpes];
    if (list.length === 0) {
        throw new RangeError('a data restriction needs at least one data property expression');
    }
    return list.map((dpe) => DataPropertyExpression.safe(dpe));
}

abstract class DataValuesFrom extends ClassExpression {
    protected abstract readonly predicate: NamedNode;
    readonly dataPropertyExpressions: readonly DataPropertyExpression[];
    readonly dataRange: DataRange;

    constructor(
        dataPropertyExpressions: DataPropertyExpressions,
        dataRange: DataRange | IdentifierBoxOrHint,
    ) {
        super();
        this.dataPropertyExpressions = toDataPropertyExpressions(dataPropertyExpressions);
        this.dataRange = DataRange.safe(dataRange);
    }

    /** @throws NotImplementedError for restrictions over two or more properties */
    toRdf(ctx: EmissionContext): BlankNode {
        const [property, ...rest] = this.dataPropertyExpressions;
        if (rest.length > 0) {
            throw new NotImplementedError(`${this.tag} over ${this.dataPropertyExpressions.length} data properties`);
        }
        return restriction(ctx, property.toRdf(ctx), this.predicate, this.dataRange.toRdf(ctx));
    }

    toFunowlArgs(): string {
        return listToFunowl([...this.dataPropertyExpressions, this.dataRange]);
    }
}

export class DataSomeValuesFrom extends DataValuesFrom {
    protected readonly predicate = OWL.someValuesFrom;
}

export class DataAllValuesFrom extends DataValuesFrom {
    protected readonly predicate = OWL.allValuesFrom;
}

export class DataHasValue extends ClassExpression {
    readonly dataPropertyExpression: DataPropertyExpression;
    readonly literal: LiteralBox;

    constructor(dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint, value: LiteralBoxOrHint) {
        super();
        this.dataPropertyExpression = DataPropertyExpression.safe(dataPropertyExpression);
        this.literal = new LiteralBox(value);
    }

    toRdf(ctx: EmissionContext): BlankNode {
        return restriction(ctx, this.dataPropertyExpression.toRdf(ctx), OWL.hasValue, this.literal.toRdf(ctx));
    }

    toFunowlArgs(): string {
        return `${this.dataPropertyExpression.toFunowl()} ${this.literal.toFunowl()}`;
    }
}

// ── Cardinalities ─────────────────────────────────────────────────

abstract class Cardinality extends ClassExpression {
    protected abstract readonly qualifiedPredicate: NamedNode;
    protected abstract readonly unqualifiedPredicate: NamedNode;
    protected abstract readonly targetPredicate: NamedNode;
    readonly n: number;

    protected constructor(n: number) {
        super();
        if (!safeValidate(CardinalitySchema, n).success) {
            throw new RangeError(`Cardinality must be a non-negative integer, got ${n}`);
        }
        this.n = n;
    }

    protected abstract propertyNode(ctx: EmissionContext): Resource;
    protected abstract get property(): Box;
    protected abstract get target(): Box | undefined;

    toRdf(ctx: EmissionContext): BlankNode {
        const node = bnode();
        addQuad(ctx, node, RDF.type, OWL.Restriction);
        addQuad(ctx, node, OWL.onProperty, this.propertyNode(ctx));
        const count = literal(String(this.n), XSD.nonNegativeInteger);
        const target = this.target;
        if (target === undefined) {
            addQuad(ctx, node, this.unqualifiedPredicate, count);
        } else {
            addQuad(ctx, node, this.qualifiedPredicate, count);
            addQuad(ctx, node, this.targetPredicate, target.toRdf(ctx));
        }
        return node;
    }

    toFunowlArgs(): string {
        const target = this.target;
        const parts = [String(this.n), this.property.toFunowl()];
        if (target !== undefined) {
            parts.push(target.toFunowl());
        }
        return parts.join(' ');
    }
}

abstract class ObjectCardinality extends Cardinality {
    protected readonly targetPredicate = OWL.onClass;
    readonly objectPropertyExpression: ObjectPropertyExpression;
    readonly classExpression?: ClassExpression;

    constructor(
        n: number,
        objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint,
        classExpression?: ClassExpression | IdentifierBoxOrHint,
    ) {
        super(n);
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
        this.classExpression = classExpression === undefined ? undefined : ClassExpression.safe(classExpression);
    }

    protected propertyNode(ctx: EmissionContext): Resource {
        if (this.objectPropertyExpression instanceof ObjectInverseOf) {
            this.objectPropertyExpression.declareWrapped(ctx);
        }
        return this.objectPropertyExpression.toRdf(ctx);
    }

    protected get property(): Box {
        return this.objectPropertyExpression;
    }

    protected get target(): Box | undefined {
        return this.classExpression;
    }
}

/** `ObjectMinCardinality(2 a:fatherOf a:Man)` */
export class ObjectMinCardinality extends ObjectCardinality {
    protected readonly qualifiedPredicate = OWL.minQualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.minCardinality;
}

export class ObjectMaxCardinality extends ObjectCardinality {
    protected readonly qualifiedPredicate = OWL.maxQualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.maxCardinality;
}

export class ObjectExactCardinality extends ObjectCardinality {
    protected readonly qualifiedPredicate = OWL.qualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.cardinality;
}

abstract class DataCardinality extends Cardinality {
    protected readonly targetPredicate = OWL.onDataRange;
    readonly dataPropertyExpression: DataPropertyExpression;
    readonly dataRange?: DataRange;

    constructor(
        n: number,
        dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint,
        dataRange?: DataRange | IdentifierBoxOrHint,
    ) {
        super(n);
        this.dataPropertyExpression = DataPropertyExpression.safe(dataPropertyExpression);
        this.dataRange = dataRange === undefined ? undefined : DataRange.safe(dataRange);
    }

    protected propertyNode(ctx: EmissionContext): Resource {
        return this.dataPropertyExpression.toRdf(ctx);
    }

    protected get property(): Box {
        return this.dataPropertyExpression;
    }

    protected get target(): Box | undefined {
        return this.dataRange;
    }
}

/** `DataMaxCardinality(1 a:hasAge)`: at most one age. */
export class DataMinCardinality extends DataCardinality {
    protected readonly qualifiedPredicate = OWL.minQualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.minCardinality;
}

export class DataMaxCardinality extends DataCardinality {
    protected readonly qualifiedPredicate = OWL.maxQualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.maxCardinality;
}

export class DataExactCardinality extends DataCardinality {
    protected readonly qualifiedPredicate = OWL.qualifiedCardinality;
    protected readonly unqualifiedPredicate = OWL.cardinality;
}
