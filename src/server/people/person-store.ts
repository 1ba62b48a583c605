import Database from 'better-sqlite3';
import { PersonFields, PersonId, PersonRow } from '../../types';

const SELECT_COLUMNS = 'id, name, age, address, work';

/**
 * SQL over the `persons` table. Every method runs synchronously and throws
 * whatever better-sqlite3 throws.
 */
export class PersonStore {
    constructor(private readonly db: Database.Database) {}

    list(): PersonRow[] {
        return this.db
            .prepare<[], PersonRow>(`SELECT ${SELECT_COLUMNS} FROM persons ORDER BY id`)
            .all();
    }

    findById(id: PersonId): PersonRow | null {
        const row = this.db
            .prepare<[PersonId], PersonRow>(`SELECT ${SELECT_COLUMNS} FROM persons WHERE id = ?`)
            .get(id);
        return row ?? null;
    }

    exists(id: PersonId): boolean {
        const row = this.db
            .prepare<[PersonId], { found: number }>('SELECT EXISTS(SELECT 1 FROM persons WHERE id = ?) AS found')
            .get(id);
        return row?.found === 1;
    }

    fetchFields(id: PersonId): PersonFields | null {
        const row = this.db
            .prepare<[PersonId], PersonFields>('SELECT name, age, address, work FROM persons WHERE id = ?')
            .get(id);
        return row ?? null;
    }

    insert(fields: PersonFields): number {
        const result = this.db
            .prepare<[string, number | null, string | null, string | null]>(`
                INSERT INTO persons (name, age, address, work)
                VALUES (?, ?, ?, ?)
            `)
            .run(fields.name, fields.age, fields.address, fields.work);
        return Number(result.lastInsertRowid);
    }

    update(id: PersonId, fields: PersonFields): number {
        const result = this.db
            .prepare<[string, number | null, string | null, string | null, PersonId]>(`
                UPDATE persons
                SET name = ?, age = ?, address = ?, work = ?
                WHERE id = ?
            `)
            .run(fields.name, fields.age, fields.address, fields.work, id);
        return result.changes;
    }

    delete(id: PersonId): number {
        return this.db.prepare<[PersonId]>('DELETE FROM persons WHERE id = ?').run(id).changes;
    }

    /**
     * Run `fn` inside a single transaction; it commits when `fn` returns
     * and rolls back when it throws.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }
}
