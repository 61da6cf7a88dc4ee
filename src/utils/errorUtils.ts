// src/utils/errorUtils.ts

export interface ErrorMessageAndStack {
    message: string;
    stack?: string;
}

/**
 * Normalizes anything thrown into a message and an optional stack.
 */
export function getErrorMessageAndStack(error: unknown): ErrorMessageAndStack {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    // Errors thrown in another realm fail `instanceof Error` but keep their shape.
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
        return { message: error.message, stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    try {
        return { message: JSON.stringify(error) };
    } catch {
        return { message: String(error) };
    }
}
