// Persons domain types

export interface PersonRow {
    id: number;
    name: string;
    age: number | null;
    address: string | null;
    work: string | null;
}

export type PersonFields = Omit<PersonRow, 'id'>;

// Route ids past the safe integer range are bound as bigint
export type PersonId = number | bigint;

export interface PersonResponse {
    id: number;
    name: string;
    age?: number;
    address?: string;
    work?: string;
}

/**
 * A JSON field as it arrived in a request body: the key was missing,
 * was present with `null`, or carried a value.
 */
export type Field<T> =
    | { state: 'absent' }
    | { state: 'null' }
    | { state: 'value'; value: T };

export interface PersonRequest {
    name: Field<string>;
    age: Field<number>;
    address: Field<string>;
    work: Field<string>;
}

export interface ErrorResponse {
    message: string;
}

export interface ValidationErrorResponse extends ErrorResponse {
    errors: Record<string, string>;
}
