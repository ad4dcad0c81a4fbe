/**
 * Error types.
 *
 * None of these describe recoverable runtime conditions of navigation: tree
 * and engine errors mark programming mistakes, document errors mark bad input.
 */

/**
 * A caller broke a tree precondition (out-of-grid address, unknown tile id).
 */
export class TreeContractError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TreeContractError';
    }
}

export function assertContract(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new TreeContractError(message);
    }
}

/**
 * The engine left the camera outside its normalized state after a call.
 */
export class InvariantViolationError extends Error {
    constructor(
        public readonly invariant: 'zoom-range' | 'anchor-bounds',
        message: string
    ) {
        super(`Invariant '${invariant}' violated: ${message}`);
        this.name = 'InvariantViolationError';
    }
}

/**
 * A persisted canvas document does not have the expected shape.
 */
export class DocumentFormatError extends Error {
    constructor(
        message: string,
        public readonly path: (string | number)[]
    ) {
        super(path.length > 0 ? `${message} at ${formatPath(path)}` : message);
        this.name = 'DocumentFormatError';
    }
}

function formatPath(path: (string | number)[]): string {
    return path
        .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
        .join('');
}
