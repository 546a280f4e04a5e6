import { Annotation } from '../annotations.js';
import {
    AltMacro,
    ClassIntersectionMacro,
    ClassUnionMacro,
    CommentMacro,
    DataPropertyMaxCardinality,
    DescriptionMacro,
    HoldsOverChain,
    IsObsoleteMacro,
    IsOBOBuiltinMacro,
    LabelMacro,
    MappingMacro,
    OBOIsSubsetMacro,
    OBONamespaceMacro,
    RelationshipMacro,
    ReplacedByMacro,
    SynonymMacro,
    TransitiveOver,
    XrefMacro,
} from '../macros.js';
import { emitsTurtle } from './helpers.js';

describe('Macros (src/macros.ts)', () => {

    describe('relationships and strings', () => {
        it('writes relationships as existential restrictions', () => {
            expect(new RelationshipMacro('hgnc:16793', 'RO:0002160', 'NCBITaxon:9606').toFunowl())
                .toBe('SubClassOf(hgnc:16793 ObjectSomeValuesFrom(RO:0002160 NCBITaxon:9606))');
        });

        it('writes labels with a language', () => {
            expect(new LabelMacro('hgnc:16793', 'RAET1E', { language: 'en' }).toFunowl())
                .toBe('AnnotationAssertion(rdfs:label hgnc:16793 "RAET1E"@en)');
        });

        it('writes descriptions, comments and namespaces', () => {
            expect(new DescriptionMacro('a:Dog', 'A domesticated canine.').toFunowl())
                .toBe('AnnotationAssertion(dcterms:description a:Dog "A domesticated canine.")');
            expect(new CommentMacro('a:Dog', 'Needs review.').toFunowl())
                .toBe('AnnotationAssertion(rdfs:comment a:Dog "Needs review.")');
            expect(new OBONamespaceMacro('a:Dog', 'animals').toFunowl())
                .toBe('AnnotationAssertion(oboInOwl:hasOBONamespace a:Dog "animals")');
        });

        it('carries annotations through', () => {
            const macro = new DescriptionMacro('a:Dog', 'A dog.', {
                annotations: [new Annotation('oboInOwl:hasDbXref', 'PMID:1234')],
            });
            expect(macro.toFunowl()).toBe('AnnotationAssertion(Annotation(oboInOwl:hasDbXref PMID:1234) dcterms:description a:Dog "A dog.")');
        });
    });

    describe('object and boolean annotations', () => {
        it('writes alternative terms and replacements', () => {
            expect(new AltMacro('a:Dog', 'a:Hound').toFunowl()).toBe('AnnotationAssertion(IAO:0000118 a:Dog a:Hound)');
            expect(new ReplacedByMacro('a:Doggy', 'a:Dog').toFunowl()).toBe('AnnotationAssertion(IAO:0100001 a:Doggy a:Dog)');
        });

        it('writes subsets', () => {
            expect(new OBOIsSubsetMacro('a:Dog', 'a:pets').toFunowl()).toBe('AnnotationAssertion(oboInOwl:inSubset a:Dog a:pets)');
        });

        it('writes booleans, true unless told otherwise', () => {
            expect(new IsObsoleteMacro('a:Doggy').toFunowl()).toBe('AnnotationAssertion(owl:deprecated a:Doggy "true"^^xsd:boolean)');
            expect(new IsOBOBuiltinMacro('a:Dog', false).toFunowl()).toBe('AnnotationAssertion(oboInOwl:builtin a:Dog "false"^^xsd:boolean)');
        });
    });

    describe('synonyms', () => {
        it('picks the predicate from the scope', () => {
            expect(new SynonymMacro('hgnc:16793', 'ULBP4', 'EXACT', { synonymType: 'OMO:0003008' }).toFunowl()).toBe(
                'AnnotationAssertion(Annotation(oboInOwl:hasSynonymType OMO:0003008) oboInOwl:hasExactSynonym hgnc:16793 "ULBP4")',
            );
        });

        it('defaults to related synonyms', () => {
            expect(new SynonymMacro('a:Dog', 'pooch').toFunowl()).toBe('AnnotationAssertion(oboInOwl:hasRelatedSynonym a:Dog "pooch")');
        });

        it('reads scopes case-insensitively', () => {
            expect(new SynonymMacro('a:Dog', 'puppy', 'narrow').toFunowl()).toBe('AnnotationAssertion(oboInOwl:hasNarrowSynonym a:Dog "puppy")');
        });

        it('takes any predicate as the scope', () => {
            expect(new SynonymMacro('a:Dog', 'doggo', 'a:hasSlangSynonym').toFunowl()).toBe('AnnotationAssertion(a:hasSlangSynonym a:Dog "doggo")');
        });

        it('orders annotations, provenance and then the synonym type', () => {
            const macro = new SynonymMacro('a:Dog', 'Hund', 'EXACT', {
                language: 'de',
                annotations: [new Annotation('rdfs:comment', 'a:note')],
                provenance: ['orcid:0000-0000-0000-0001'],
                synonymType: 'OMO:0003000',
            });
            expect(macro.toFunowl()).toBe(
                'AnnotationAssertion(Annotation(rdfs:comment a:note) Annotation(oboInOwl:hasDbXref orcid:0000-0000-0000-0001) '
                + 'Annotation(oboInOwl:hasSynonymType OMO:0003000) oboInOwl:hasExactSynonym a:Dog "Hund"@de)',
            );
        });

        it('reifies the synonym type in RDF', () => {
            expect(emitsTurtle([new SynonymMacro('a:Dog', 'doggo', 'EXACT', { synonymType: 'OMO:0003008' })], `
                a:Dog oboInOwl:hasExactSynonym "doggo" .
                oboInOwl:hasSynonymType a owl:AnnotationProperty .
                [] a owl:Axiom ;
                    owl:annotatedSource a:Dog ;
                    owl:annotatedProperty oboInOwl:hasExactSynonym ;
                    owl:annotatedTarget "doggo" ;
                    oboInOwl:hasSynonymType OMO:0003008 .
            `)).toBe(true);
        });
    });

    describe('mappings', () => {
        it('maps scopes onto SKOS', () => {
            const macro = new MappingMacro('a:Dog', 'EXACT', 'b:Hund', { mappingJustification: 'semapv:ManualMappingCuration' });
            expect(macro.toFunowl()).toBe(
                'AnnotationAssertion(Annotation(sssom:mapping_justification semapv:ManualMappingCuration) skos:exactMatch a:Dog b:Hund)',
            );
        });

        it('writes cross-references', () => {
            expect(new XrefMacro('agrovoc:0619dd9e', 'agro:00000137').toFunowl())
                .toBe('AnnotationAssertion(oboInOwl:hasDbXref agrovoc:0619dd9e agro:00000137)');
        });
    });

    describe('property chains and class shorthands', () => {
        it('writes transitive-over as a chain', () => {
            expect(new TransitiveOver('BFO:0000066', 'BFO:0000050').toFunowl())
                .toBe('SubObjectPropertyOf(ObjectPropertyChain(BFO:0000066 BFO:0000050) BFO:0000066)');
        });

        it('writes holds-over chains', () => {
            expect(new HoldsOverChain('RO:0002202', ['BFO:0000050', 'RO:0002202']).toFunowl())
                .toBe('SubObjectPropertyOf(ObjectPropertyChain(BFO:0000050 RO:0002202) RO:0002202)');
        });

        it('writes data property maximum cardinality on owl:Thing', () => {
            expect(new DataPropertyMaxCardinality(1, 'a:hasAge').toFunowl())
                .toBe('SubClassOf(owl:Thing DataMaxCardinality(1 a:hasAge))');
        });

        it('writes genus and differentia', () => {
            expect(new ClassIntersectionMacro('ZFA:0000134', ['CL:0000540', ['BFO:0000050', 'NCBITaxon:7955']]).toFunowl()).toBe(
                'EquivalentClasses(ZFA:0000134 ObjectIntersectionOf(CL:0000540 ObjectSomeValuesFrom(BFO:0000050 NCBITaxon:7955)))',
            );
        });

        it('writes unions', () => {
            expect(new ClassUnionMacro('a:Pet', ['a:Dog', 'a:Cat']).toFunowl())
                .toBe('EquivalentClasses(a:Pet ObjectUnionOf(a:Dog a:Cat))');
        });
    });
});
