/**
 * High-level Client API for owlbox.
 *
 * Provides a validated interface for building documents, serializing them
 * and converting OBO ontologies.
 */

import type { Store } from 'n3';
import { PrefixMap } from './converter.js';
import { logger } from './logger.js';
import { getOfnFromObo, OboConversionOptions } from './obo/to-functional.js';
import { OboOntology } from './obo/types.js';
import { Document, Ontology, OntologyOptions, Prefix } from './ontology.js';
import { Reference } from './reference.js';
import { PrefixMapSchema, validate } from './schemas.js';

function isPrefixList(prefixes: PrefixMap | readonly Prefix[]): prefixes is readonly Prefix[] {
    return Array.isArray(prefixes);
}

export class OwlBoxClient {
    /**
     * Build a single-ontology document.
     * Prefix maps are schema-validated.
     */
    public document(options: OntologyOptions, prefixes: PrefixMap | readonly Prefix[] = {}): Document {
        const validPrefixes = isPrefixList(prefixes) ? prefixes : validate(PrefixMapSchema, prefixes);
        return new Document(new Ontology(options), validPrefixes);
    }

    /**
     * Functional-style syntax for a document.
     */
    public toFunowl(document: Document): string {
        return document.toFunowl();
    }

    /**
     * The RDF graph of a single-ontology document.
     */
    public toRdf(document: Document): Store {
        return document.toRdf();
    }

    /**
     * Turtle for a single-ontology document, with the document's prefixes.
     */
    public toTurtle(document: Document): Promise<string> {
        return document.toTurtle();
    }

    /**
     * Convert an OBO ontology to a functional OWL document.
     */
    public fromObo(obo: OboOntology, options?: OboConversionOptions): Document {
        logger.debug('converting OBO ontology', { ontology: obo.ontology });
        return getOfnFromObo(obo, options);
    }

    /**
     * Parse a CURIE into a reference.
     */
    public reference(curie: string, name?: string): Reference {
        return Reference.fromCurie(curie, name);
    }
}

export default new OwlBoxClient();
