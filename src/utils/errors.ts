export class AppError extends Error {
    constructor(message: string, public readonly statusCode: number = 500) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(message: string, public readonly details: string[] = []) {
        super(message, 400);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404);
    }
}

export class FileNotReadyError extends AppError {
    constructor(message: string) {
        super(message, 408);
    }
}

export const getErrorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : 'Unknown error';
