/**
 * @owlbox/core: OWL 2 in boxes
 *
 * Build OWL 2 ontologies out of typed boxes and write them as
 * functional-style syntax or as RDF. Includes macros for common OBO
 * patterns and a converter from OBO ontologies.
 */

// Core boxes
export * from './box.js';
export * from './primitives.js';
export * from './expressions.js';
export * from './annotations.js';
export * from './axioms.js';
export * from './macros.js';
export * from './ontology.js';

// Identifiers and vocabulary
export * from './reference.js';
export * from './converter.js';
export * from './vocabulary.js';
export * from './rdf.js';

// OBO adapter
export * from './obo/types.js';
export * from './obo/to-functional.js';

// Ambient
export * from './errors.js';
export * from './schemas.js';
export * from './config.js';
export * from './logger.js';
export * from './client.js';
