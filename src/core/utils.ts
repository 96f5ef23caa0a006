import { StructuredError } from './errors.js';

export function serializeErrorForClient(error: unknown): { code?: string; message: string } {
    if (error instanceof StructuredError) {
        return { code: error.code, message: error.message };
    }
    return { message: formatError(error) };
}

export function formatError(error: unknown) {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

export function textResponse(payload: unknown, isError = false) {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
    return isError
        ? { content: [{ type: 'text' as const, text }], isError: true }
        : { content: [{ type: 'text' as const, text }] };
}

export function delay(ms: number) {
    return new Promise<void>((resolve) => setTimeout(resolve, ms));
}
