export { parseDeclarationFile, parseDeclarations } from './parseDeclarations.js';
export { readMethodAttribute } from './parseAttribute.js';
export { parseTypeText } from './typeFromNode.js';
