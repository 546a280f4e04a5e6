import { DataFactory } from 'n3';
import { addTriple, Annotation, AnnotationProperty, reifyTriple } from '../annotations.js';
import { Converter, EXAMPLE_PREFIX_MAP } from '../converter.js';
import { NotImplementedError } from '../errors.js';
import { l } from '../primitives.js';
import { createContext } from '../rdf.js';
import { OWL, RDF, RDFS } from '../vocabulary.js';
import { emitsTurtle } from './helpers.js';

const { namedNode } = DataFactory;

const dog = namedNode('https://example.org/a:Dog');
const animal = namedNode('https://example.org/a:Animal');

function context() {
    return createContext(Converter.fromPrefixMap({ ...EXAMPLE_PREFIX_MAP }));
}

describe('Annotations and reification (src/annotations.ts)', () => {

    describe('Annotation', () => {
        it('writes nested annotations first', () => {
            const annotation = new Annotation('dcterms:contributor', 'orcid:0000-0000-0000-0001', [
                new Annotation('rdfs:comment', l('first pass')),
                new Annotation('rdfs:comment', l('second pass')),
            ]);
            expect(annotation.toFunowl()).toBe(
                'Annotation(Annotation(rdfs:comment "first pass") Annotation(rdfs:comment "second pass") dcterms:contributor orcid:0000-0000-0000-0001)',
            );
        });

        it('has no node of its own', () => {
            expect(() => new Annotation('rdfs:comment', l('x')).toRdf(context())).toThrow(NotImplementedError);
        });

        it('attaches to a node', () => {
            const ctx = context();
            new Annotation('rdfs:comment', l('good boy')).addTo(ctx, dog);
            expect(ctx.store.size).toBe(1);
            expect(ctx.store.countQuads(dog, RDFS.comment, null, null)).toBe(1);
        });
    });

    describe('AnnotationProperty', () => {
        it('declares custom properties', () => {
            expect(emitsTurtle([new AnnotationProperty('a:nickname')], 'a:nickname a owl:AnnotationProperty .')).toBe(true);
        });

        it('skips built-in properties', () => {
            expect(emitsTurtle([new AnnotationProperty('rdfs:label')], '')).toBe(true);
        });
    });

    describe('reifyTriple', () => {
        it('does nothing without annotations', () => {
            const ctx = context();
            expect(reifyTriple(ctx, dog, RDFS.subClassOf, animal)).toBeUndefined();
            expect(ctx.store.size).toBe(0);
        });

        it('writes the node when forced', () => {
            const ctx = context();
            const node = reifyTriple(ctx, dog, RDFS.subClassOf, animal, { force: true });
            if (node === undefined) {
                throw new Error('expected a reification node');
            }
            expect(ctx.store.size).toBe(4);
            expect(ctx.store.countQuads(node, RDF.type, OWL.Axiom, null)).toBe(1);
            expect(ctx.store.countQuads(node, OWL.annotatedTarget, animal, null)).toBe(1);
        });

        it('uses the given type and predicates', () => {
            const ctx = context();
            const node = reifyTriple(ctx, dog, RDFS.subClassOf, animal, {
                force: true,
                type: OWL.NegativePropertyAssertion,
                predicates: [OWL.sourceIndividual, OWL.assertionProperty, OWL.targetIndividual],
            });
            if (node === undefined) {
                throw new Error('expected a reification node');
            }
            expect(ctx.store.countQuads(node, RDF.type, OWL.NegativePropertyAssertion, null)).toBe(1);
            expect(ctx.store.countQuads(node, OWL.sourceIndividual, dog, null)).toBe(1);
            expect(ctx.store.countQuads(node, OWL.annotatedSource, null, null)).toBe(0);
        });
    });

    describe('addTriple', () => {
        it('returns the reification node only when annotated', () => {
            const ctx = context();
            expect(addTriple(ctx, dog, RDFS.subClassOf, animal)).toBeUndefined();
            const node = addTriple(ctx, dog, RDFS.seeAlso, animal, [new Annotation('rdfs:comment', l('see'))]);
            expect(node).toBeDefined();
            // two plain triples, four reification triples and the comment
            expect(ctx.store.size).toBe(7);
        });
    });
});
