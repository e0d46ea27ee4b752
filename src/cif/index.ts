export { parseCif } from './parser.js';
export { tokenize, type Token, type TokenType } from './lexer.js';
export { CifDocument, deriveLoopName, type Row, type RowCondition, type Table } from './document.js';
export * from './values.js';
