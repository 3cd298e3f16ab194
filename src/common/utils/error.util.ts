export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function errorStack(error: unknown): string | undefined {
    return error instanceof Error ? error.stack : undefined;
}
