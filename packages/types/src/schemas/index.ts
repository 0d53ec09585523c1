export { TokenSchema, TokenListSchema, parseTokenList } from './token.js';
export type { TokenInput } from './token.js';
