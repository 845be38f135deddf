/**
 * Identifier module exports.
 */
export {
    sanitizeIdentifier,
    isIdentifier,
    assertIdentifier,
    ident,
    type Identifier,
} from './sanitize.js';

export { IdentifierInvalidError } from './errors.js';
