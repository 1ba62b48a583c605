/**
 * Persons API Service
 * REST endpoints for listing, creating, reading, patching and deleting persons
 */

import express from 'express';
import bodyParser from 'body-parser';
import { PersonId, PersonResponse, PersonRow } from '../../types';
import { sendError, sendValidationError } from '../responses';
import { PersonStore } from './person-store';
import {
    decodePersonRequest,
    isBlank,
    mergePersonFields,
    parsePersonId,
    toInsertFields
} from './person-request';

export const PERSONS_PATH = '/persons';
export const BODY_LIMIT = '10mb';

export function toPersonResponse(row: PersonRow): PersonResponse {
    const person: PersonResponse = { id: row.id, name: row.name };
    if (row.age !== null) person.age = row.age;
    if (row.address !== null) person.address = row.address;
    if (row.work !== null) person.work = row.work;
    return person;
}

const methodNotAllowed = (allow: string): express.RequestHandler => (_req, res) => {
    res.set('Allow', allow);
    sendError(res, 405, 'Method not allowed');
};

const readBody = (req: express.Request): string =>
    typeof req.body === 'string' ? req.body : '';

export class PersonService {
    private router: express.Router;

    /**
     * @param basePath prefix the router is mounted under, used for `Location` headers
     */
    constructor(private readonly store: PersonStore, private readonly basePath: string = '/api/v1') {
        this.router = express.Router();
        this.setupRoutes();
    }

    private setupRoutes() {
        // Bodies are decoded by the handlers so malformed JSON is reported in handler order
        const rawBody = bodyParser.text({ type: () => true, limit: BODY_LIMIT });

        this.router.get(PERSONS_PATH, (_req, res) => this.listPersons(res));
        this.router.post(PERSONS_PATH, rawBody, (req, res) => this.createPerson(req, res));
        this.router.get(`${PERSONS_PATH}/:id`, (req, res) => this.getPerson(req, res));
        this.router.patch(`${PERSONS_PATH}/:id`, rawBody, (req, res) => this.updatePerson(req, res));
        this.router.delete(`${PERSONS_PATH}/:id`, (req, res) => this.deletePerson(req, res));

        this.router.all(PERSONS_PATH, methodNotAllowed('GET, POST'));
        this.router.all(`${PERSONS_PATH}/:id`, methodNotAllowed('GET, PATCH, DELETE'));
    }

    // GET /persons - List all persons
    private listPersons(res: express.Response): void {
        let rows: PersonRow[];
        try {
            rows = this.store.list();
        } catch (error) {
            console.error('[persons] Error listing persons:', error);
            sendError(res, 500, 'Database query error');
            return;
        }
        res.json(rows.map(toPersonResponse));
    }

    // POST /persons - Create new person
    private createPerson(req: express.Request, res: express.Response): void {
        const decoded = decodePersonRequest(readBody(req));
        if (!decoded.ok) {
            sendError(res, 400, 'json decoding error');
            return;
        }

        const { request } = decoded;
        if (request.name.state !== 'value' || isBlank(request.name.value)) {
            sendValidationError(res, 'name validation error', { name: 'name is required' });
            return;
        }

        let id: number;
        try {
            id = this.store.insert(toInsertFields(request, request.name.value));
        } catch (error) {
            console.error('[persons] Error creating person:', error);
            sendError(res, 500, 'Query error');
            return;
        }

        res.location(`${this.basePath}${PERSONS_PATH}/${id}`);
        res.status(201).end();
    }

    // GET /persons/:id - Get specific person
    private getPerson(req: express.Request, res: express.Response): void {
        const id = parsePersonId(req.params.id);
        if (id === null) {
            sendError(res, 400, 'Invalid ID format');
            return;
        }
        this.sendPerson(res, id);
    }

    // PATCH /persons/:id - Merge the sent fields into the stored person
    private updatePerson(req: express.Request, res: express.Response): void {
        const id = parsePersonId(req.params.id);
        if (id === null) {
            sendError(res, 400, 'Invalid ID format');
            return;
        }

        const decoded = decodePersonRequest(readBody(req));
        if (!decoded.ok) {
            sendValidationError(res, 'Invalid json', { body: 'invalid json format' });
            return;
        }

        const { request } = decoded;
        if (request.name.state === 'value' && isBlank(request.name.value)) {
            sendValidationError(res, 'name validation error', { name: 'name must not be blank' });
            return;
        }

        let found: boolean;
        try {
            found = this.store.transaction(() => {
                if (!this.store.exists(id)) return false;
                const current = this.store.fetchFields(id);
                if (!current) return false;
                this.store.update(id, mergePersonFields(current, request));
                return true;
            });
        } catch (error) {
            console.error('[persons] Error updating person:', error);
            sendError(res, 500, 'Failed to update person');
            return;
        }

        if (!found) {
            sendError(res, 404, 'Person not found');
            return;
        }
        this.sendPerson(res, id);
    }

    // DELETE /persons/:id - Delete person
    private deletePerson(req: express.Request, res: express.Response): void {
        const id = parsePersonId(req.params.id);
        if (id === null) {
            sendError(res, 400, 'Invalid ID format');
            return;
        }

        let deleted: number;
        try {
            deleted = this.store.delete(id);
        } catch (error) {
            console.error('[persons] Error deleting person:', error);
            sendError(res, 500, 'Database error');
            return;
        }

        if (deleted === 0) {
            sendError(res, 404, 'Person not found');
            return;
        }
        res.status(204).end();
    }

    private sendPerson(res: express.Response, id: PersonId): void {
        let row: PersonRow | null;
        try {
            row = this.store.findById(id);
        } catch (error) {
            console.error('[persons] Error fetching person:', error);
            sendError(res, 500, 'Scanning error');
            return;
        }

        if (!row) {
            sendError(res, 404, 'Person not found');
            return;
        }
        res.json(toPersonResponse(row));
    }

    getRouter(): express.Router {
        return this.router;
    }
}
