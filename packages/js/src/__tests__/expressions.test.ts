import { NotImplementedError } from '../errors.js';
import {
    DataComplementOf,
    DataExactCardinality,
    DataHasValue,
    DataIntersectionOf,
    DataOneOf,
    DataSomeValuesFrom,
    DatatypeRestriction,
    ObjectAllValuesFrom,
    ObjectComplementOf,
    ObjectHasSelf,
    ObjectHasValue,
    ObjectIntersectionOf,
    ObjectInverseOf,
    ObjectMaxCardinality,
    ObjectMinCardinality,
    ObjectOneOf,
    ObjectSomeValuesFrom,
    ObjectUnionOf,
    SimpleDataRange,
} from '../expressions.js';
import { emitsTurtle, quadsOf } from './helpers.js';

describe('Class expressions and data ranges (src/expressions.ts)', () => {

    // ── Functional syntax ─────────────────────────────────────────────────────

    describe('functional syntax', () => {
        it('writes nested class expressions', () => {
            const expression = new ObjectIntersectionOf([
                'a:Dog',
                new ObjectComplementOf(new ObjectSomeValuesFrom('a:hasOwner', 'a:Person')),
            ]);
            expect(expression.toFunowl()).toBe(
                'ObjectIntersectionOf(a:Dog ObjectComplementOf(ObjectSomeValuesFrom(a:hasOwner a:Person)))',
            );
        });

        it('writes inverse properties', () => {
            const expression = new ObjectAllValuesFrom(new ObjectInverseOf('a:fatherOf'), 'a:Man');
            expect(expression.toFunowl()).toBe('ObjectAllValuesFrom(ObjectInverseOf(a:fatherOf) a:Man)');
        });

        it('keeps the input order of enumerations', () => {
            expect(new ObjectOneOf(['a:Stewie', 'a:Chris']).toFunowl()).toBe('ObjectOneOf(a:Stewie a:Chris)');
        });

        it('reads strings in literal enumerations as text', () => {
            expect(new DataOneOf(['Peter', 1]).toFunowl()).toBe('DataOneOf("Peter" "1"^^xsd:integer)');
        });

        it('writes facet restrictions', () => {
            const range = new DatatypeRestriction('xsd:integer', [['xsd:minInclusive', 5], ['xsd:maxExclusive', 10]]);
            expect(range.toFunowl()).toBe(
                'DatatypeRestriction(xsd:integer xsd:minInclusive "5"^^xsd:integer xsd:maxExclusive "10"^^xsd:integer)',
            );
        });

        it('writes cardinalities with and without a filler', () => {
            expect(new ObjectMinCardinality(2, 'a:fatherOf', 'a:Man').toFunowl()).toBe('ObjectMinCardinality(2 a:fatherOf a:Man)');
            expect(new DataExactCardinality(1, 'a:hasAge').toFunowl()).toBe('DataExactCardinality(1 a:hasAge)');
        });

        it('writes data restrictions over several properties', () => {
            expect(new DataSomeValuesFrom(['a:hasAge', 'a:hasShoeSize'], 'xsd:integer').toFunowl())
                .toBe('DataSomeValuesFrom(a:hasAge a:hasShoeSize xsd:integer)');
        });

        it('writes self restrictions and values', () => {
            expect(new ObjectHasSelf('a:likes').toFunowl()).toBe('ObjectHasSelf(a:likes)');
            expect(new ObjectHasValue('a:fatherOf', 'a:Stewie').toFunowl()).toBe('ObjectHasValue(a:fatherOf a:Stewie)');
            expect(new DataHasValue('a:hasAge', 17).toFunowl()).toBe('DataHasValue(a:hasAge "17"^^xsd:integer)');
        });
    });

    // ── Arity and value checks ────────────────────────────────────────────────

    describe('validation', () => {
        it('requires two operands for n-ary expressions', () => {
            expect(() => new ObjectIntersectionOf(['a:Dog'])).toThrow(RangeError);
            expect(() => new ObjectUnionOf([])).toThrow(RangeError);
            expect(() => new DataIntersectionOf(['xsd:integer'])).toThrow(RangeError);
            expect(() => new ObjectOneOf(['a:Stewie'])).toThrow(RangeError);
        });

        it('requires at least one literal or facet', () => {
            expect(() => new DataOneOf([])).toThrow(RangeError);
            expect(() => new DatatypeRestriction('xsd:integer', [])).toThrow(RangeError);
        });

        it('requires at least one data property', () => {
            expect(() => new DataSomeValuesFrom([], 'xsd:integer')).toThrow(RangeError);
        });

        it('rejects negative and fractional cardinalities', () => {
            expect(() => new ObjectMinCardinality(-1, 'a:fatherOf')).toThrow(RangeError);
            expect(() => new ObjectMaxCardinality(1.5, 'a:fatherOf')).toThrow(RangeError);
        });
    });

    // ── RDF ───────────────────────────────────────────────────────────────────

    describe('RDF', () => {
        it('writes existential restrictions', () => {
            expect(emitsTurtle([new ObjectSomeValuesFrom('a:hasPet', 'a:Dog')], `
                a:hasPet a owl:ObjectProperty .
                a:Dog a owl:Class .
                [] a owl:Restriction ; owl:onProperty a:hasPet ; owl:someValuesFrom a:Dog .
            `)).toBe(true);
        });

        it('does not declare owl:Thing', () => {
            expect(emitsTurtle([new ObjectComplementOf('owl:Thing')], `
                [] a owl:Class ; owl:complementOf owl:Thing .
            `)).toBe(true);
        });

        it('sorts the individuals of an enumeration', () => {
            expect(emitsTurtle([new ObjectOneOf(['a:Stewie', 'a:Chris'])], `
                a:Stewie a owl:NamedIndividual .
                a:Chris a owl:NamedIndividual .
                [] a owl:Class ; owl:oneOf ( a:Chris a:Stewie ) .
            `)).toBe(true);
        });

        it('types the list nodes of literal enumerations', () => {
            expect(emitsTurtle([new DataOneOf(['Peter', 1])], `
                [] a rdfs:Datatype ; owl:oneOf _:first .
                _:first a rdf:List ; rdf:first "Peter" ; rdf:rest _:second .
                _:second a rdf:List ; rdf:first 1 ; rdf:rest rdf:nil .
            `)).toBe(true);
        });

        it('declares only datatypes outside the built-in map', () => {
            expect(emitsTurtle([new DataComplementOf(new SimpleDataRange('a:Shoe'))], `
                a:Shoe a rdfs:Datatype .
                [] a rdfs:Datatype ; owl:datatypeComplementOf a:Shoe .
            `)).toBe(true);
            expect(emitsTurtle([new DataIntersectionOf(['xsd:nonNegativeInteger', 'xsd:nonPositiveInteger'])], `
                [] a rdfs:Datatype ; owl:intersectionOf ( xsd:nonNegativeInteger xsd:nonPositiveInteger ) .
            `)).toBe(true);
        });

        it('writes facets as one blank node each', () => {
            expect(emitsTurtle([new DatatypeRestriction('xsd:integer', [['xsd:minInclusive', 5]])], `
                [] a rdfs:Datatype ; owl:onDatatype xsd:integer ; owl:withRestrictions ( [ xsd:minInclusive 5 ] ) .
            `)).toBe(true);
        });

        it('writes qualified cardinalities', () => {
            expect(emitsTurtle([new ObjectMinCardinality(2, 'a:fatherOf', 'a:Man')], `
                a:fatherOf a owl:ObjectProperty .
                a:Man a owl:Class .
                [] a owl:Restriction ; owl:onProperty a:fatherOf ;
                    owl:minQualifiedCardinality "2"^^xsd:nonNegativeInteger ; owl:onClass a:Man .
            `)).toBe(true);
        });

        it('declares the property under an inverse in cardinalities', () => {
            expect(emitsTurtle([new ObjectMaxCardinality(1, new ObjectInverseOf('a:fatherOf'))], `
                a:fatherOf a owl:ObjectProperty .
                [] a owl:Restriction ; owl:onProperty [ owl:inverseOf a:fatherOf ] ;
                    owl:maxCardinality "1"^^xsd:nonNegativeInteger .
            `)).toBe(true);
        });

        it('leaves the property under an inverse undeclared in other restrictions', () => {
            expect(emitsTurtle([new ObjectSomeValuesFrom(new ObjectInverseOf('a:fatherOf'), 'a:Man')], `
                a:Man a owl:Class .
                [] a owl:Restriction ; owl:onProperty [ owl:inverseOf a:fatherOf ] ; owl:someValuesFrom a:Man .
            `)).toBe(true);
        });

        it('writes self restrictions with a boolean', () => {
            expect(emitsTurtle([new ObjectHasSelf('a:likes')], `
                a:likes a owl:ObjectProperty .
                [] a owl:Restriction ; owl:onProperty a:likes ; owl:hasSelf true .
            `)).toBe(true);
        });

        it('writes data values', () => {
            expect(emitsTurtle([new DataHasValue('a:hasAge', 17)], `
                a:hasAge a owl:DatatypeProperty .
                [] a owl:Restriction ; owl:onProperty a:hasAge ; owl:hasValue 17 .
            `)).toBe(true);
        });

        it('has no RDF for data restrictions over several properties', () => {
            const expression = new DataSomeValuesFrom(['a:hasAge', 'a:hasShoeSize'], 'xsd:integer');
            expect(() => quadsOf([expression])).toThrow(NotImplementedError);
        });
    });
});
