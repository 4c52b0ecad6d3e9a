// packages/core/src/instructions/index.ts -- barrel re-export

export { isNoop, parseInstruction, splitStatements } from './parser.js';
export { formatInstruction, formatStatement } from './formatter.js';
