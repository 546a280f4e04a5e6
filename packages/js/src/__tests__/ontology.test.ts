import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Parser } from 'n3';
import { isomorphic } from 'rdf-isomorphic';
import { ZodError } from 'zod';
import { Annotation } from '../annotations.js';
import { Declaration, SubClassOf } from '../axioms.js';
import { NotImplementedError } from '../errors.js';
import { LabelMacro } from '../macros.js';
import { Document, Import, Ontology, Prefix, writeOntology } from '../ontology.js';
import { l } from '../primitives.js';
import { createContext } from '../rdf.js';
import { Converter } from '../converter.js';
import { parseTurtle } from './helpers.js';

const PREFIXES = { a: 'https://example.org/a:' };

describe('Ontologies and documents (src/ontology.ts)', () => {

    // ── Ontology ──────────────────────────────────────────────────────────────

    describe('Ontology', () => {
        it('writes the IRI and the axioms', () => {
            const ontology = new Ontology({
                iri: 'https://example.org/test.ofn',
                axioms: [new Declaration('a:Dog', 'Class')],
            });
            expect(ontology.toFunowl()).toBe('Ontology(<https://example.org/test.ofn>\nDeclaration(Class(a:Dog))\n)');
        });

        it('separates imports, annotations and axioms with blank lines', () => {
            const ontology = new Ontology({
                iri: 'https://example.org/test.ofn',
                versionIri: 'https://example.org/1.0/test.ofn',
                imports: ['https://example.org/other.ofn'],
                annotations: [new Annotation('rdfs:comment', l('A test'))],
                axioms: [new Declaration('a:Dog', 'Class'), new LabelMacro('a:Dog', 'dog')],
            });
            expect(ontology.toFunowl()).toBe([
                'Ontology(<https://example.org/test.ofn> <https://example.org/1.0/test.ofn>',
                'Import(<https://example.org/other.ofn>)',
                '',
                'Annotation(rdfs:comment "A test")',
                '',
                'Declaration(Class(a:Dog))',
                'AnnotationAssertion(rdfs:label a:Dog "dog")',
                ')',
            ].join('\n'));
        });

        it('drops the version IRI without an IRI', () => {
            const ontology = new Ontology({ versionIri: 'https://example.org/1.0/test.ofn' });
            expect(ontology.toFunowl()).toBe('Ontology(\n\n)');
        });

        it('validates header IRIs', () => {
            expect(() => new Ontology({ iri: 'not an iri' })).toThrow(ZodError);
            expect(() => new Ontology({ imports: ['nope'] })).toThrow(ZodError);
        });

        it('uses a blank node without an IRI', () => {
            const ctx = createContext(Converter.fromPrefixMap(PREFIXES));
            const node = new Ontology({ versionIri: 'https://example.org/1.0/test.ofn' }).toRdf(ctx);
            expect(node.termType).toBe('BlankNode');
            expect(ctx.store.size).toBe(1);
        });
    });

    describe('Prefix and Import', () => {
        it('writes prefixes', () => {
            expect(new Prefix('a', 'https://example.org/a:').toFunowl()).toBe('Prefix(a:=<https://example.org/a:>)');
        });

        it('gives prefixes no RDF', () => {
            const ctx = createContext(Converter.fromPrefixMap(PREFIXES));
            expect(() => new Prefix('a', 'https://example.org/a:').toRdf(ctx)).toThrow(NotImplementedError);
        });

        it('writes imports', () => {
            expect(new Import('https://example.org/other.ofn').toFunowl()).toBe('Import(<https://example.org/other.ofn>)');
        });
    });

    // ── Document ──────────────────────────────────────────────────────────────

    describe('Document', () => {
        const ontology = new Ontology({
            iri: 'https://example.org/test.ofn',
            versionIri: 'https://example.org/1.0/test.ofn',
            imports: ['https://example.org/other.ofn'],
            annotations: [new Annotation('rdfs:comment', l('A test'))],
            axioms: [new SubClassOf('a:Dog', 'a:Animal')],
        });

        it('sorts prefix maps case-insensitively', () => {
            const document = new Document(new Ontology(), { b: 'https://example.org/b/', A: 'https://example.org/A/', a: 'https://example.org/a:' });
            expect(document.prefixes.map((p) => p.prefix)).toEqual(['A', 'a', 'b']);
        });

        it('keeps the order of prefix lists', () => {
            const document = new Document(new Ontology(), [new Prefix('b', 'https://example.org/b/'), new Prefix('a', 'https://example.org/a:')]);
            expect(document.toFunowl()).toBe(
                'Prefix(b:=<https://example.org/b/>)\nPrefix(a:=<https://example.org/a:>)\n\nOntology(\n\n)',
            );
        });

        it('writes prefixes and then each ontology', () => {
            const document = new Document(new Ontology({ iri: 'https://example.org/test.ofn' }), PREFIXES);
            expect(document.toFunowl()).toBe('Prefix(a:=<https://example.org/a:>)\n\nOntology(<https://example.org/test.ofn>\n\n)');
        });

        it('builds the RDF graph', () => {
            const store = new Document(ontology, PREFIXES).toRdf();
            const expected = parseTurtle(`
                <https://example.org/test.ofn> a owl:Ontology ;
                    owl:versionIRI <https://example.org/1.0/test.ofn> ;
                    owl:imports <https://example.org/other.ofn> ;
                    rdfs:comment "A test" .
                a:Dog a owl:Class ; rdfs:subClassOf a:Animal .
                a:Animal a owl:Class .
            `);
            expect(isomorphic(store.getQuads(null, null, null, null), expected)).toBe(true);
        });

        it('exports only single-ontology documents to RDF', () => {
            const document = new Document([new Ontology(), new Ontology()], PREFIXES);
            expect(() => document.toRdf()).toThrow(RangeError);
        });

        it('expands CURIEs with the built-in prefixes too', () => {
            expect(new Document(ontology, PREFIXES).converter.expand('owl:Thing')).toBe('http://www.w3.org/2002/07/owl#Thing');
        });

        it('serializes Turtle that parses back to the same graph', async () => {
            const document = new Document(ontology, PREFIXES);
            const turtle = await document.toTurtle();
            const parsed = new Parser().parse(turtle);
            expect(isomorphic(parsed, document.toRdf().getQuads(null, null, null, null))).toBe(true);
        });

        it('serializes N-Triples', async () => {
            const document = new Document(new Ontology({ iri: 'https://example.org/test.ofn' }), PREFIXES);
            expect(await document.toNTriples()).toBe(
                '<https://example.org/test.ofn> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.w3.org/2002/07/owl#Ontology> .\n',
            );
        });
    });

    // ── Files ─────────────────────────────────────────────────────────────────

    describe('writing files', () => {
        let directory: string;

        beforeEach(async () => {
            directory = await mkdtemp(join(tmpdir(), 'owlbox-'));
        });

        afterEach(async () => {
            await rm(directory, { recursive: true, force: true });
        });

        it('writes functional OWL', async () => {
            const path = join(directory, 'test.ofn');
            await writeOntology(path, { prefixes: PREFIXES, iri: 'https://example.org/test.ofn', axioms: [new Declaration('a:Dog', 'Class')] });
            expect(await readFile(path, 'utf-8')).toBe(
                'Prefix(a:=<https://example.org/a:>)\n\nOntology(<https://example.org/test.ofn>\nDeclaration(Class(a:Dog))\n)',
            );
        });

        it('writes Turtle', async () => {
            const path = join(directory, 'test.ttl');
            const document = new Document(new Ontology({ iri: 'https://example.org/test.ofn' }), PREFIXES);
            await document.writeRdf(path);
            expect(await readFile(path, 'utf-8')).toBe(await document.toTurtle());
        });
    });
});
