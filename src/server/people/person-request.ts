import { z } from 'zod';
import { Field, PersonFields, PersonId, PersonRequest } from '../../types';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export const personBodySchema = z.object({
    name: z.string().nullish(),
    age: z.number().int().min(INT32_MIN).max(INT32_MAX).nullish(),
    address: z.string().nullish(),
    work: z.string().nullish()
});

export type PersonBody = z.infer<typeof personBodySchema>;

export type DecodeResult =
    | { ok: true; request: PersonRequest }
    | { ok: false; reason: string };

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function toField<T>(raw: Record<string, unknown>, key: keyof PersonBody, value: T | null | undefined): Field<T> {
    if (!Object.hasOwn(raw, key)) return { state: 'absent' };
    if (value === null || value === undefined) return { state: 'null' };
    return { state: 'value', value };
}

/**
 * Decode a raw request body into a PersonRequest, keeping track of which
 * keys were sent. A literal `null` document decodes like `{}`.
 */
export function decodePersonRequest(body: string): DecodeResult {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : 'invalid json' };
    }

    const raw = parsed === null ? {} : parsed;
    if (!isPlainObject(raw)) {
        return { ok: false, reason: 'body must be a JSON object' };
    }

    const result = personBodySchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        return { ok: false, reason: `${issue.path.join('.')}: ${issue.message}` };
    }

    const data = result.data;
    return {
        ok: true,
        request: {
            name: toField(raw, 'name', data.name),
            age: toField(raw, 'age', data.age),
            address: toField(raw, 'address', data.address),
            work: toField(raw, 'work', data.work)
        }
    };
}

/**
 * Route ids follow base-10 integer syntax with an optional sign and must fit
 * a signed 64-bit integer. Ids outside the safe integer range come back as
 * bigint.
 */
export function parsePersonId(raw: string): PersonId | null {
    if (!/^[+-]?\d+$/.test(raw)) return null;
    const id = Number(raw);
    if (Number.isSafeInteger(id)) return id;
    const wide = BigInt(raw);
    return wide >= INT64_MIN && wide <= INT64_MAX ? wide : null;
}

export const isBlank = (value: string) => value.trim() === '';

const valueOr = <T>(field: Field<T>, fallback: T | null): T | null =>
    field.state === 'value' ? field.value : fallback;

/**
 * Fields for a new row. Optional fields that are absent or null are stored
 * as null. The caller has already checked that `name` carries a value.
 */
export function toInsertFields(request: PersonRequest, name: string): PersonFields {
    return {
        name,
        age: valueOr(request.age, null),
        address: valueOr(request.address, null),
        work: valueOr(request.work, null)
    };
}

/**
 * Partial merge over the stored fields. Only fields carrying a value
 * overwrite; an explicit `null` keeps the stored value, the same as an
 * absent key, so a PATCH cannot clear an optional field.
 */
export function mergePersonFields(current: PersonFields, request: PersonRequest): PersonFields {
    return {
        name: request.name.state === 'value' ? request.name.value : current.name,
        age: valueOr(request.age, current.age),
        address: valueOr(request.address, current.address),
        work: valueOr(request.work, current.work)
    };
}
