export { parseTransactionSheet, parseAmount } from './sheet.js';
