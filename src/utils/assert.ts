export const assert = (condition: boolean, message: string): void => {
    if (!condition) {
        throw new Error(`Assertion failed: ${message}`);
    }
};

export const assertNever = <T extends never>(value: never, message: string): T => {
    throw new Error(`${message} - value: ${JSON.stringify(value)}`);
};

/** asserts that every component of a vector is a finite number */
export const assertFiniteVec3 = (value: ArrayLike<number>, name: string): void => {
    for (let i = 0; i < value.length; i++) {
        assert(Number.isFinite(value[i]), `${name}[${i}] must be finite, got ${value[i]}`);
    }
};
