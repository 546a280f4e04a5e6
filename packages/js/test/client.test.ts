import client from '../src/client';
import { OwlBoxClient } from '../src/client';
import { Declaration } from '../src/axioms';
import { c } from '../src/reference';

describe('OwlBoxClient', () => {
    it('is exported as default and named export', () => {
        expect(client).toBeInstanceOf(OwlBoxClient);
    });

    describe('document', () => {
        it('validates prefix maps', () => {
            expect(() => {
                client.document({}, { 'bad prefix': 'https://example.org/' });
            }).toThrow(); // Zod error
        });

        it('builds a single-ontology document', () => {
            const document = client.document(
                { iri: 'https://example.org/pets.ofn', axioms: [new Declaration('a:Dog', 'Class')] },
                { a: 'https://example.org/a:' },
            );
            expect(client.toFunowl(document)).toBe(
                'Prefix(a:=<https://example.org/a:>)\n\nOntology(<https://example.org/pets.ofn>\nDeclaration(Class(a:Dog))\n)',
            );
        });
    });

    describe('toRdf', () => {
        it('expands CURIEs with the document prefixes', () => {
            const document = client.document({ axioms: [new Declaration('a:Dog', 'Class')] }, { a: 'https://example.org/a:' });
            const store = client.toRdf(document);
            // the blank ontology node and the declaration
            expect(store.size).toBe(2);
            expect(store.countQuads('https://example.org/a:Dog', null, null, null)).toBe(1);
        });
    });

    describe('toTurtle', () => {
        it('writes Turtle with the document prefixes', async () => {
            const document = client.document({ iri: 'https://example.org/pets.ofn' }, { a: 'https://example.org/a:' });
            const turtle = await client.toTurtle(document);
            expect(turtle).toContain('<https://example.org/pets.ofn> a owl:Ontology');
        });
    });

    describe('fromObo', () => {
        it('converts OBO ontologies', () => {
            const document = client.fromObo(
                { ontology: 'pets', terms: [{ reference: c('a:Dog'), name: 'dog' }] },
                { iriBase: 'https://example.org/resources' },
            );
            expect(document.ontologies[0].iri).toBe('https://example.org/resources/pets/pets.ofn');
            expect(document.ontologies[0].axioms.map((axiom) => axiom.toFunowl())).toEqual([
                'Declaration(Class(a:Dog))',
                'AnnotationAssertion(rdfs:label a:Dog "dog")',
            ]);
        });
    });

    describe('reference', () => {
        it('parses CURIEs', () => {
            expect(client.reference('a:Dog').curie).toBe('a:Dog');
            expect(() => client.reference('dog')).toThrow(RangeError);
        });
    });
});
