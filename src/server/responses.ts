import { Response } from 'express';
import { ErrorResponse, ValidationErrorResponse } from '../types';

export function sendError(res: Response, statusCode: number, message: string): void {
    const body: ErrorResponse = { message };
    res.status(statusCode).json(body);
}

/**
 * 400 with the field-to-reason map. Used only for input validation failures.
 */
export function sendValidationError(res: Response, message: string, errors: Record<string, string>): void {
    const body: ValidationErrorResponse = { message, errors };
    res.status(400).json(body);
}
