/**
 * Error normalization.
 */


/**
 * Coerce a thrown value to an Error.
 *
 * `catch` binds `unknown`; drivers and user callbacks occasionally throw
 * strings or plain objects.
 */
export function toError(value: unknown): Error {

    if (value instanceof Error) {

        return value

    }

    return new Error(typeof value === 'string' ? value : JSON.stringify(value))

}
