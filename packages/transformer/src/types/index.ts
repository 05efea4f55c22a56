export { Direction, isDirection, assertDirection, opposite } from './direction.js';
export type { Converter, FieldDefinition, FieldDeclaration } from './definition.js';
