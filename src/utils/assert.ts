/** throws when `condition` is false; narrows `condition` for the code after it */
export function assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new Error(`Assertion failed: ${message}`);
    }
}

/** exhaustiveness guard for switches over discriminated unions */
export const assertNever = (value: never, message: string): never => {
    throw new Error(`${message} - value: ${JSON.stringify(value)}`);
};
