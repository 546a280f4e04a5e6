/**
 * OWL 2 axioms: declarations, class and property axioms, keys, assertions
 * and annotation axioms.
 *
 * Every axiom carries an ordered list of annotations. In functional syntax
 * they come first, `SubClassOf(Annotation(rdfs:comment "...") a:Baby a:Child)`;
 * in RDF the axiom's main triple is reified so they can attach to it.
 */

import type { NamedNode } from '@rdfjs/types';
import { addTriple, Annotation, AnnotationProperty, reifyTriple, ReificationPredicates } from './annotations.js';
import { Box, listToFunowl } from './box.js';
import {
    ClassExpression,
    DataPropertyExpression,
    DataRange,
    ObjectInverseOf,
    ObjectPropertyExpression,
    SimpleObjectPropertyExpression,
} from './expressions.js';
import {
    IdentifierBox,
    IdentifierBoxOrHint,
    LiteralBox,
    LiteralBoxOrHint,
    PrimitiveBox,
    primitiveBox,
    PrimitiveHint,
} from './primitives.js';
import { addQuad, bnode, EmissionContext, makeSequence, pairs, RdfNode, Resource, sortNodes } from './rdf.js';
import { OWL, RDF, RDFS } from './vocabulary.js';

function requireAtLeastTwo<T>(items: readonly T[], what: string): readonly T[] {
    if (items.length < 2) {
        throw new RangeError(`${what} requires at least 2, got ${items.length}`);
    }
    return items;
}

/** Declare the property wrapped by an inverse; other expressions are left alone. */
function declareInverse(ope: ObjectPropertyExpression, ctx: EmissionContext): void {
    if (ope instanceof ObjectInverseOf) {
        ope.declareWrapped(ctx);
    }
}

// ── Base ──────────────────────────────────────────────────────────

export abstract class Axiom extends Box {
    readonly annotations: readonly Annotation[];

    protected constructor(annotations: readonly Annotation[] = []) {
        super();
        this.annotations = annotations;
    }

    /** Returns the reification node when annotated, otherwise the subject of the main triple. */
    abstract override toRdf(ctx: EmissionContext): Resource;

    /** The operands, without annotations. */
    protected abstract toFunowlInside(): string;

    toFunowlArgs(): string {
        const inside = this.toFunowlInside();
        return this.annotations.length > 0 ? `${listToFunowl(this.annotations)} ${inside}` : inside;
    }

    /** Add `s p o` with this axiom's annotations. */
    protected add(ctx: EmissionContext, subject: Resource, predicate: NamedNode, object: RdfNode): Resource {
        return addTriple(ctx, subject, predicate, object, this.annotations) ?? subject;
    }

    /** One annotated triple per pair of nodes. */
    protected addPairwise(ctx: EmissionContext, nodes: readonly Resource[], predicate: NamedNode): Resource {
        for (const [s, o] of pairs(nodes)) {
            this.add(ctx, s, predicate, o);
        }
        return nodes[0];
    }

    /**
     * A blank node of `type` listing `members`. The annotations go straight
     * onto that node since there is no triple to reify.
     */
    protected addGroup(ctx: EmissionContext, type: NamedNode, predicate: NamedNode, members: readonly Resource[]): Resource {
        const node = bnode();
        addQuad(ctx, node, RDF.type, type);
        addQuad(ctx, node, predicate, makeSequence(ctx, members));
        for (const annotation of this.annotations) {
            annotation.addTo(ctx, node);
        }
        return node;
    }

    /** Two nodes are linked directly, more are grouped in sorted order. */
    protected addDisjoint(ctx: EmissionContext, nodes: readonly Resource[], predicate: NamedNode, groupType: NamedNode): Resource {
        if (nodes.length === 2) {
            return this.add(ctx, nodes[0], predicate, nodes[1]);
        }
        return this.addGroup(ctx, groupType, OWL.members, sortNodes(nodes));
    }
}

// ── Declarations ──────────────────────────────────────────────────

export type DeclarationType = 'Class' | 'ObjectProperty' | 'DataProperty' | 'Datatype' | 'AnnotationProperty' | 'NamedIndividual';

const DECLARATION_TYPES: Readonly<Record<DeclarationType, NamedNode>> = {
    Class: OWL.Class,
    ObjectProperty: OWL.ObjectProperty,
    DataProperty: OWL.DatatypeProperty,
    Datatype: RDFS.Datatype,
    AnnotationProperty: OWL.AnnotationProperty,
    NamedIndividual: OWL.NamedIndividual,
};

/** `Declaration(Class(a:Person))` */
export class Declaration extends Axiom {
    readonly node: IdentifierBox;
    readonly type: DeclarationType;

    constructor(node: IdentifierBoxOrHint, type: DeclarationType, annotations?: readonly Annotation[]) {
        super(annotations);
        this.node = new IdentifierBox(node);
        this.type = type;
    }

    toRdf(ctx: EmissionContext): Resource {
        return this.add(ctx, this.node.toRdf(ctx), RDF.type, DECLARATION_TYPES[this.type]);
    }

    protected toFunowlInside(): string {
        return `${this.type}(${this.node.toFunowl()})`;
    }
}

// ── Class axioms ──────────────────────────────────────────────────

/**
 * `SubClassOf(a:Baby a:Child)`: each baby is a child.
 *
 * The parent can be any class expression; `SubClassOf(owl:Thing
 * DataMaxCardinality(1 a:hasAge))` is the long form of a functional data
 * property.
 */
export class SubClassOf extends Axiom {
    readonly child: ClassExpression;
    readonly parent: ClassExpression;

    constructor(
        child: ClassExpression | IdentifierBoxOrHint,
        parent: ClassExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.child = ClassExpression.safe(child);
        this.parent = ClassExpression.safe(parent);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.child.toRdf(ctx);
        return this.add(ctx, s, RDFS.subClassOf, this.parent.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.child.toFunowl()} ${this.parent.toFunowl()}`;
    }
}

abstract class ClassExpressionListAxiom extends Axiom {
    readonly classExpressions: readonly ClassExpression[];

    constructor(classExpressions: ReadonlyArray<ClassExpression | IdentifierBoxOrHint>, annotations?: readonly Annotation[]) {
        super(annotations);
        this.classExpressions = requireAtLeastTwo(classExpressions, this.tag).map((ce) => ClassExpression.safe(ce));
    }

    protected toFunowlInside(): string {
        return listToFunowl(this.classExpressions);
    }
}

/** Every pair of classes gets its own annotated `owl:equivalentClass` triple. */
export class EquivalentClasses extends ClassExpressionListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        return this.addPairwise(ctx, this.classExpressions.map((ce) => ce.toRdf(ctx)), OWL.equivalentClass);
    }
}

/** `DisjointClasses(a:Boy a:Girl)`: nobody is both a boy and a girl. */
export class DisjointClasses extends ClassExpressionListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        const nodes = this.classExpressions.map((ce) => ce.toRdf(ctx));
        return this.addDisjoint(ctx, nodes, OWL.disjointWith, OWL.AllDisjointClasses);
    }
}

/** `DisjointUnion(a:Child a:Boy a:Girl)`: every child is exactly one of boy or girl. */
export class DisjointUnion extends Axiom {
    readonly parent: IdentifierBox;
    readonly classExpressions: readonly ClassExpression[];

    constructor(
        parent: IdentifierBoxOrHint,
        classExpressions: ReadonlyArray<ClassExpression | IdentifierBoxOrHint>,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.parent = new IdentifierBox(parent);
        this.classExpressions = requireAtLeastTwo(classExpressions, 'DisjointUnion').map((ce) => ClassExpression.safe(ce));
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.parent.toRdf(ctx);
        const members = this.classExpressions.map((ce) => ce.toRdf(ctx));
        return this.add(ctx, s, OWL.disjointUnionOf, makeSequence(ctx, members));
    }

    protected toFunowlInside(): string {
        return listToFunowl([this.parent, ...this.classExpressions]);
    }
}

// ── Object property axioms ────────────────────────────────────────

/**
 * A chain of object properties, only meaningful as the child of
 * {@link SubObjectPropertyOf}. Its RDF node is the list of its members.
 */
export class ObjectPropertyChain extends Box {
    readonly objectPropertyExpressions: readonly ObjectPropertyExpression[];

    constructor(objectPropertyExpressions: ReadonlyArray<ObjectPropertyExpression | IdentifierBoxOrHint>) {
        super();
        this.objectPropertyExpressions = requireAtLeastTwo(objectPropertyExpressions, 'ObjectPropertyChain')
            .map((ope) => ObjectPropertyExpression.safe(ope));
    }

    toRdf(ctx: EmissionContext): Resource {
        return makeSequence(ctx, this.objectPropertyExpressions.map((ope) => ope.toRdf(ctx)));
    }

    toFunowlArgs(): string {
        return listToFunowl(this.objectPropertyExpressions);
    }
}

/**
 * `SubObjectPropertyOf(a:hasDog a:hasPet)`. With a chain as the child,
 * `SubObjectPropertyOf(ObjectPropertyChain(a:hasMother a:hasSister) a:hasAunt)`
 * is written as `a:hasAunt owl:propertyChainAxiom (a:hasMother a:hasSister)`.
 */
export class SubObjectPropertyOf extends Axiom {
    readonly child: ObjectPropertyExpression | ObjectPropertyChain;
    readonly parent: ObjectPropertyExpression;

    constructor(
        child: ObjectPropertyExpression | ObjectPropertyChain | IdentifierBoxOrHint,
        parent: ObjectPropertyExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.child = child instanceof ObjectPropertyChain ? child : ObjectPropertyExpression.safe(child);
        this.parent = ObjectPropertyExpression.safe(parent);
    }

    toRdf(ctx: EmissionContext): Resource {
        declareInverse(this.parent, ctx);
        if (this.child instanceof ObjectPropertyChain) {
            const chain = this.child.toRdf(ctx);
            return this.add(ctx, this.parent.toRdf(ctx), OWL.propertyChainAxiom, chain);
        }
        declareInverse(this.child, ctx);
        const s = this.child.toRdf(ctx);
        return this.add(ctx, s, RDFS.subPropertyOf, this.parent.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.child.toFunowl()} ${this.parent.toFunowl()}`;
    }
}

abstract class ObjectPropertyListAxiom extends Axiom {
    readonly objectPropertyExpressions: readonly ObjectPropertyExpression[];

    constructor(
        objectPropertyExpressions: ReadonlyArray<ObjectPropertyExpression | IdentifierBoxOrHint>,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.objectPropertyExpressions = requireAtLeastTwo(objectPropertyExpressions, this.tag)
            .map((ope) => ObjectPropertyExpression.safe(ope));
    }

    protected toFunowlInside(): string {
        return listToFunowl(this.objectPropertyExpressions);
    }
}

export class EquivalentObjectProperties extends ObjectPropertyListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        return this.addPairwise(ctx, this.objectPropertyExpressions.map((ope) => ope.toRdf(ctx)), OWL.equivalentProperty);
    }
}

export class DisjointObjectProperties extends ObjectPropertyListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        const nodes = this.objectPropertyExpressions.map((ope) => ope.toRdf(ctx));
        return this.addDisjoint(ctx, nodes, OWL.propertyDisjointWith, OWL.AllDisjointProperties);
    }
}

/** `InverseObjectProperties(a:hasFather a:fatherOf)` */
export class InverseObjectProperties extends Axiom {
    readonly left: ObjectPropertyExpression;
    readonly right: ObjectPropertyExpression;

    constructor(
        left: ObjectPropertyExpression | IdentifierBoxOrHint,
        right: ObjectPropertyExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.left = ObjectPropertyExpression.safe(left);
        this.right = ObjectPropertyExpression.safe(right);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.left.toRdf(ctx);
        return this.add(ctx, s, OWL.inverseOf, this.right.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.left.toFunowl()} ${this.right.toFunowl()}`;
    }
}

abstract class ObjectPropertyTypingAxiom extends Axiom {
    protected abstract readonly predicate: NamedNode;
    readonly objectPropertyExpression: ObjectPropertyExpression;
    readonly classExpression: ClassExpression;

    constructor(
        objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint,
        classExpression: ClassExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
        this.classExpression = ClassExpression.safe(classExpression);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.objectPropertyExpression.toRdf(ctx);
        return this.add(ctx, s, this.predicate, this.classExpression.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.objectPropertyExpression.toFunowl()} ${this.classExpression.toFunowl()}`;
    }
}

export class ObjectPropertyDomain extends ObjectPropertyTypingAxiom {
    protected readonly predicate = RDFS.domain;
}

export class ObjectPropertyRange extends ObjectPropertyTypingAxiom {
    protected readonly predicate = RDFS.range;
}

abstract class UnaryObjectPropertyAxiom extends Axiom {
    protected abstract readonly characteristic: NamedNode;
    readonly objectPropertyExpression: ObjectPropertyExpression;

    constructor(objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(annotations);
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
    }

    toRdf(ctx: EmissionContext): Resource {
        return this.add(ctx, this.objectPropertyExpression.toRdf(ctx), RDF.type, this.characteristic);
    }

    protected toFunowlInside(): string {
        return this.objectPropertyExpression.toFunowl();
    }
}

/** `FunctionalObjectProperty(a:hasFather)`: everyone has at most one father. */
export class FunctionalObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.FunctionalProperty;
}

export class InverseFunctionalObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.InverseFunctionalProperty;
}

export class ReflexiveObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.ReflexiveProperty;
}

export class IrreflexiveObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.IrreflexiveProperty;
}

export class SymmetricObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.SymmetricProperty;
}

export class AsymmetricObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.AsymmetricProperty;
}

/** `TransitiveObjectProperty(a:ancestorOf)` */
export class TransitiveObjectProperty extends UnaryObjectPropertyAxiom {
    protected readonly characteristic = OWL.TransitiveProperty;
}

// ── Data property axioms ──────────────────────────────────────────

export class SubDataPropertyOf extends Axiom {
    readonly child: DataPropertyExpression;
    readonly parent: DataPropertyExpression;

    constructor(
        child: DataPropertyExpression | IdentifierBoxOrHint,
        parent: DataPropertyExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.child = DataPropertyExpression.safe(child);
        this.parent = DataPropertyExpression.safe(parent);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.child.toRdf(ctx);
        return this.add(ctx, s, RDFS.subPropertyOf, this.parent.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.child.toFunowl()} ${this.parent.toFunowl()}`;
    }
}

abstract class DataPropertyListAxiom extends Axiom {
    readonly dataPropertyExpressions: readonly DataPropertyExpression[];

    constructor(
        dataPropertyExpressions: ReadonlyArray<DataPropertyExpression | IdentifierBoxOrHint>,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.dataPropertyExpressions = requireAtLeastTwo(dataPropertyExpressions, this.tag)
            .map((dpe) => DataPropertyExpression.safe(dpe));
    }

    protected toFunowlInside(): string {
        return listToFunowl(this.dataPropertyExpressions);
    }
}

export class EquivalentDataProperties extends DataPropertyListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        return this.addPairwise(ctx, this.dataPropertyExpressions.map((dpe) => dpe.toRdf(ctx)), OWL.equivalentProperty);
    }
}

export class DisjointDataProperties extends DataPropertyListAxiom {
    toRdf(ctx: EmissionContext): Resource {
        const nodes = this.dataPropertyExpressions.map((dpe) => dpe.toRdf(ctx));
        return this.addDisjoint(ctx, nodes, OWL.propertyDisjointWith, OWL.AllDisjointProperties);
    }
}

abstract class DataPropertyTypingAxiom<T extends Box> extends Axiom {
    protected abstract readonly predicate: NamedNode;
    readonly dataPropertyExpression: DataPropertyExpression;
    readonly target: T;

    protected constructor(dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint, target: T, annotations?: readonly Annotation[]) {
        super(annotations);
        this.dataPropertyExpression = DataPropertyExpression.safe(dataPropertyExpression);
        this.target = target;
    }

    protected abstract targetNode(ctx: EmissionContext): Resource;

    toRdf(ctx: EmissionContext): Resource {
        const s = this.dataPropertyExpression.toRdf(ctx);
        return this.add(ctx, s, this.predicate, this.targetNode(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.dataPropertyExpression.toFunowl()} ${this.target.toFunowl()}`;
    }
}

/** `DataPropertyDomain(a:hasName a:Person)`: only people have names. */
export class DataPropertyDomain extends DataPropertyTypingAxiom<ClassExpression> {
    protected readonly predicate = RDFS.domain;

    constructor(
        dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint,
        classExpression: ClassExpression | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(dataPropertyExpression, ClassExpression.safe(classExpression), annotations);
    }

    protected targetNode(ctx: EmissionContext): Resource {
        return this.target.toRdf(ctx);
    }
}

/** `DataPropertyRange(a:hasAge xsd:nonNegativeInteger)` */
export class DataPropertyRange extends DataPropertyTypingAxiom<DataRange> {
    protected readonly predicate = RDFS.range;

    constructor(
        dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint,
        dataRange: DataRange | IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(dataPropertyExpression, DataRange.safe(dataRange), annotations);
    }

    protected targetNode(ctx: EmissionContext): Resource {
        return this.target.toRdf(ctx);
    }
}

/** `FunctionalDataProperty(a:hasAge)`: each object can have at most one age. */
export class FunctionalDataProperty extends Axiom {
    readonly dataPropertyExpression: DataPropertyExpression;

    constructor(dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(annotations);
        this.dataPropertyExpression = DataPropertyExpression.safe(dataPropertyExpression);
    }

    toRdf(ctx: EmissionContext): Resource {
        return this.add(ctx, this.dataPropertyExpression.toRdf(ctx), RDF.type, OWL.FunctionalProperty);
    }

    protected toFunowlInside(): string {
        return this.dataPropertyExpression.toFunowl();
    }
}

// ── Datatype definitions and keys ─────────────────────────────────

/** `DatatypeDefinition(a:SSN DatatypeRestriction(xsd:string xsd:pattern "[0-9]{3}-[0-9]{2}-[0-9]{4}"))` */
export class DatatypeDefinition extends Axiom {
    readonly datatype: IdentifierBox;
    readonly dataRange: DataRange;

    constructor(datatype: IdentifierBoxOrHint, dataRange: DataRange | IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(annotations);
        this.datatype = new IdentifierBox(datatype);
        this.dataRange = DataRange.safe(dataRange);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.datatype.toRdf(ctx);
        addQuad(ctx, s, RDF.type, RDFS.Datatype);
        return this.add(ctx, s, OWL.equivalentClass, this.dataRange.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.datatype.toFunowl()} ${this.dataRange.toFunowl()}`;
    }
}

/** `HasKey(a:Person () (a:hasSSN))`: people are identified by their social security number. */
export class HasKey extends Axiom {
    readonly classExpression: ClassExpression;
    readonly objectPropertyExpressions: readonly ObjectPropertyExpression[];
    readonly dataPropertyExpressions: readonly DataPropertyExpression[];

    constructor(
        classExpression: ClassExpression | IdentifierBoxOrHint,
        objectPropertyExpressions: ReadonlyArray<ObjectPropertyExpression | IdentifierBoxOrHint>,
        dataPropertyExpressions: ReadonlyArray<DataPropertyExpression | IdentifierBoxOrHint>,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.classExpression = ClassExpression.safe(classExpression);
        this.objectPropertyExpressions = objectPropertyExpressions.map((ope) => ObjectPropertyExpression.safe(ope));
        this.dataPropertyExpressions = dataPropertyExpressions.map((dpe) => DataPropertyExpression.safe(dpe));
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.classExpression.toRdf(ctx);
        const keys = [
            ...this.objectPropertyExpressions.map((ope) => ope.toRdf(ctx)),
            ...this.dataPropertyExpressions.map((dpe) => dpe.toRdf(ctx)),
        ];
        return this.add(ctx, s, OWL.hasKey, makeSequence(ctx, keys));
    }

    protected toFunowlInside(): string {
        return [
            this.classExpression.toFunowl(),
            `(${listToFunowl(this.objectPropertyExpressions)})`,
            `(${listToFunowl(this.dataPropertyExpressions)})`,
        ].join(' ');
    }
}

// ── Assertions ────────────────────────────────────────────────────

abstract class IndividualListAssertion extends Axiom {
    readonly individuals: readonly IdentifierBox[];

    constructor(individuals: readonly IdentifierBoxOrHint[], annotations?: readonly Annotation[]) {
        super(annotations);
        this.individuals = requireAtLeastTwo(individuals, this.tag).map((i) => new IdentifierBox(i));
    }

    protected toFunowlInside(): string {
        return listToFunowl(this.individuals);
    }
}

export class SameIndividual extends IndividualListAssertion {
    toRdf(ctx: EmissionContext): Resource {
        return this.addPairwise(ctx, this.individuals.map((i) => i.toRdf(ctx)), OWL.sameAs);
    }
}

/** Two individuals get `owl:differentFrom`; more an `owl:AllDifferent` node listing them in order. */
export class DifferentIndividuals extends IndividualListAssertion {
    toRdf(ctx: EmissionContext): Resource {
        const nodes = this.individuals.map((i) => i.toRdf(ctx));
        if (nodes.length === 2) {
            return this.add(ctx, nodes[0], OWL.differentFrom, nodes[1]);
        }
        return this.addGroup(ctx, OWL.AllDifferent, OWL.distinctMembers, nodes);
    }
}

/** `ClassAssertion(a:Dog a:Brian)`: Brian is a dog. */
export class ClassAssertion extends Axiom {
    readonly classExpression: ClassExpression;
    readonly individual: IdentifierBox;

    constructor(
        classExpression: ClassExpression | IdentifierBoxOrHint,
        individual: IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.classExpression = ClassExpression.safe(classExpression);
        this.individual = new IdentifierBox(individual);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.individual.toRdf(ctx);
        addQuad(ctx, s, RDF.type, OWL.NamedIndividual);
        return this.add(ctx, s, RDF.type, this.classExpression.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.classExpression.toFunowl()} ${this.individual.toFunowl()}`;
    }
}

abstract class ObjectPropertyAssertionBase extends Axiom {
    readonly objectPropertyExpression: ObjectPropertyExpression;
    readonly sourceIndividual: IdentifierBox;
    readonly targetIndividual: IdentifierBox;

    constructor(
        objectPropertyExpression: ObjectPropertyExpression | IdentifierBoxOrHint,
        sourceIndividual: IdentifierBoxOrHint,
        targetIndividual: IdentifierBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.objectPropertyExpression = ObjectPropertyExpression.safe(objectPropertyExpression);
        this.sourceIndividual = new IdentifierBox(sourceIndividual);
        this.targetIndividual = new IdentifierBox(targetIndividual);
    }

    protected toFunowlInside(): string {
        return [this.objectPropertyExpression, this.sourceIndividual, this.targetIndividual]
            .map((box) => box.toFunowl())
            .join(' ');
    }
}

/**
 * `ObjectPropertyAssertion(a:parentOf a:Peter a:Chris)`. An inverse
 * property is written with its individuals swapped, so
 * `ObjectPropertyAssertion(ObjectInverseOf(a:childOf) a:Peter a:Chris)`
 * becomes `a:Chris a:childOf a:Peter`.
 */
export class ObjectPropertyAssertion extends ObjectPropertyAssertionBase {
    toRdf(ctx: EmissionContext): Resource {
        const source = this.sourceIndividual.toRdf(ctx);
        const target = this.targetIndividual.toRdf(ctx);
        const ope = this.objectPropertyExpression;
        if (ope instanceof ObjectInverseOf) {
            return this.add(ctx, target, ope.declareWrapped(ctx), source);
        }
        if (ope instanceof SimpleObjectPropertyExpression) {
            return this.add(ctx, source, ope.toRdf(ctx), target);
        }
        throw new TypeError(`Unhandled object property expression: ${ope.tag}`);
    }
}

const NEGATIVE_OBJECT_PREDICATES: ReificationPredicates = [OWL.sourceIndividual, OWL.assertionProperty, OWL.targetIndividual];
const NEGATIVE_DATA_PREDICATES: ReificationPredicates = [OWL.sourceIndividual, OWL.assertionProperty, OWL.targetValue];

/** Always a `owl:NegativePropertyAssertion` node; there is no plain triple to write. */
export class NegativeObjectPropertyAssertion extends ObjectPropertyAssertionBase {
    toRdf(ctx: EmissionContext): Resource {
        const source = this.sourceIndividual.toRdf(ctx);
        const target = this.targetIndividual.toRdf(ctx);
        declareInverse(this.objectPropertyExpression, ctx);
        const property = this.objectPropertyExpression.toRdf(ctx);
        return reifyTriple(ctx, source, property, target, {
            annotations: this.annotations,
            type: OWL.NegativePropertyAssertion,
            force: true,
            predicates: NEGATIVE_OBJECT_PREDICATES,
        }) ?? source;
    }
}

abstract class DataPropertyAssertionBase extends Axiom {
    readonly dataPropertyExpression: DataPropertyExpression;
    readonly source: IdentifierBox;
    readonly target: LiteralBox;

    constructor(
        dataPropertyExpression: DataPropertyExpression | IdentifierBoxOrHint,
        source: IdentifierBoxOrHint,
        target: LiteralBoxOrHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.dataPropertyExpression = DataPropertyExpression.safe(dataPropertyExpression);
        this.source = new IdentifierBox(source);
        this.target = new LiteralBox(target);
    }

    protected toFunowlInside(): string {
        return [this.dataPropertyExpression, this.source, this.target].map((box) => box.toFunowl()).join(' ');
    }
}

/** `DataPropertyAssertion(a:hasAge a:Meg 17)`: Meg is seventeen years old. */
export class DataPropertyAssertion extends DataPropertyAssertionBase {
    toRdf(ctx: EmissionContext): Resource {
        const s = this.source.toRdf(ctx);
        return this.add(ctx, s, this.dataPropertyExpression.toRdf(ctx), this.target.toRdf(ctx));
    }
}

export class NegativeDataPropertyAssertion extends DataPropertyAssertionBase {
    toRdf(ctx: EmissionContext): Resource {
        const s = this.source.toRdf(ctx);
        return reifyTriple(ctx, s, this.dataPropertyExpression.toRdf(ctx), this.target.toRdf(ctx), {
            annotations: this.annotations,
            type: OWL.NegativePropertyAssertion,
            force: true,
            predicates: NEGATIVE_DATA_PREDICATES,
        }) ?? s;
    }
}

// ── Annotation axioms ─────────────────────────────────────────────

/**
 * `AnnotationAssertion(rdfs:label a:Dog "dog")`. The value follows
 * {@link primitiveBox}: strings are CURIEs, so text goes in a literal.
 */
export class AnnotationAssertion extends Axiom {
    readonly annotationProperty: IdentifierBox;
    readonly subject: IdentifierBox;
    readonly value: PrimitiveBox;

    constructor(
        annotationProperty: IdentifierBoxOrHint,
        subject: IdentifierBoxOrHint,
        value: PrimitiveHint,
        annotations?: readonly Annotation[],
    ) {
        super(annotations);
        this.annotationProperty = new IdentifierBox(annotationProperty);
        this.subject = new IdentifierBox(subject);
        this.value = primitiveBox(value);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.subject.toRdf(ctx);
        return this.add(ctx, s, this.annotationProperty.toRdf(ctx), this.value.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return [this.annotationProperty, this.subject, this.value].map((box) => box.toFunowl()).join(' ');
    }
}

export class SubAnnotationPropertyOf extends Axiom {
    readonly child: IdentifierBox;
    readonly parent: IdentifierBox;

    constructor(child: IdentifierBoxOrHint, parent: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(annotations);
        this.child = new IdentifierBox(child);
        this.parent = new IdentifierBox(parent);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.child.toRdf(ctx);
        return this.add(ctx, s, RDFS.subPropertyOf, this.parent.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.child.toFunowl()} ${this.parent.toFunowl()}`;
    }
}

abstract class AnnotationPropertyTypingAxiom extends Axiom {
    protected abstract readonly predicate: NamedNode;
    readonly annotationProperty: AnnotationProperty;
    readonly value: IdentifierBox;

    constructor(annotationProperty: IdentifierBoxOrHint, value: IdentifierBoxOrHint, annotations?: readonly Annotation[]) {
        super(annotations);
        this.annotationProperty = new AnnotationProperty(annotationProperty);
        this.value = new IdentifierBox(value);
    }

    toRdf(ctx: EmissionContext): Resource {
        const s = this.annotationProperty.toRdf(ctx);
        return this.add(ctx, s, this.predicate, this.value.toRdf(ctx));
    }

    protected toFunowlInside(): string {
        return `${this.annotationProperty.toFunowl()} ${this.value.toFunowl()}`;
    }
}

export class AnnotationPropertyDomain extends AnnotationPropertyTypingAxiom {
    protected readonly predicate = RDFS.domain;
}

/** `AnnotationPropertyRange(rdfs:label xsd:string)` */
export class AnnotationPropertyRange extends AnnotationPropertyTypingAxiom {
    protected readonly predicate = RDFS.range;
}
