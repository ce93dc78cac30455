import { mergeConfig } from '@vendure/core';
import {
    createTestEnvironment,
    registerInitializer,
    SqljsInitializer,
    testConfig as defaultTestConfig,
} from '@vendure/testing';
import { LanguageCode } from '@vendure/common/lib/generated-types';
import { InitialData } from '@vendure/core/dist/data-import/index';
import gql from 'graphql-tag';
import path from 'path';
import { ObjectLiteral, Repository } from 'typeorm';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';

import { Property } from '../src/entities';
import { PropertySyncPlugin } from '../src/property-sync.plugin';

/**
 * E2E tests for linking properties to newly created sub-entities.
 *
 * Runs against an in-memory sql.js database, so the blocking event
 * handler, the TypeORM queries and the Admin API are exercised together.
 */

const testInitialData: InitialData = {
    defaultLanguage: LanguageCode.en,
    defaultZone: 'Europe',
    taxRates: [{ name: 'Standard Tax', percentage: 20 }],
    shippingMethods: [{ name: 'Standard Shipping', price: 500 }],
    paymentMethods: [],
    countries: [{ name: 'United Kingdom', code: 'GB', zone: 'Europe' }],
    collections: [],
};

registerInitializer('sqljs', new SqljsInitializer(path.join(__dirname, '__data__')));

const TEST_SETUP_TIMEOUT_MS = 120_000;

const config = mergeConfig(defaultTestConfig, {
    apiOptions: {
        port: 3099,
    },
    dbConnectionOptions: {
        type: 'sqljs' as const,
        database: new Uint8Array([]),
        logging: false,
    },
    plugins: [PropertySyncPlugin.init({})],
});

// --- GraphQL Queries & Mutations ---

const CREATE_MASTER = gql`
    mutation CreateMaster($input: CreateMasterInput!) {
        createMaster(input: $input) {
            id
            name
        }
    }
`;

const CREATE_PROPERTY = gql`
    mutation CreateProperty($input: CreatePropertyInput!) {
        createProperty(input: $input) {
            id
            name
            masterId
            subEntityId
        }
    }
`;

const CREATE_SUB_ENTITY = gql`
    mutation CreateSubEntity($input: CreateSubEntityInput!) {
        createSubEntity(input: $input) {
            id
            name
            masterId
        }
    }
`;

const GET_PROPERTIES = gql`
    query GetProperties($masterId: ID!) {
        properties(masterId: $masterId) {
            id
            name
            subEntityId
        }
    }
`;

// --- Tests ---

describe('Property sync E2E', () => {
    const { server, adminClient } = createTestEnvironment(config);

    async function createMaster(name: string): Promise<string> {
        const result = await adminClient.query(CREATE_MASTER, { input: { name } });
        return result.createMaster.id;
    }

    async function createProperty(name: string, masterId: string): Promise<string> {
        const result = await adminClient.query(CREATE_PROPERTY, { input: { name, masterId } });
        return result.createProperty.id;
    }

    async function createSubEntity(name: string, masterId?: string): Promise<{ id: string; masterId: string | null }> {
        const result = await adminClient.query(CREATE_SUB_ENTITY, { input: { name, masterId } });
        return result.createSubEntity;
    }

    /** Property name → linked sub-entity id. */
    async function links(masterId: string): Promise<Record<string, string | null>> {
        const result = await adminClient.query(GET_PROPERTIES, { masterId });
        return Object.fromEntries(
            result.properties.map((p: { name: string; subEntityId: string | null }) => [p.name, p.subEntityId]),
        );
    }

    beforeAll(async () => {
        await server.init({
            initialData: testInitialData,
            customerCount: 0,
        });
        await adminClient.asSuperAdmin();
    }, TEST_SETUP_TIMEOUT_MS);

    afterAll(async () => {
        await server.destroy();
    });

    describe('creating a sub-entity', () => {
        let blockA: string;
        let blockB: string;
        let firstUnitId: string;
        let secondUnitId: string;

        beforeAll(async () => {
            blockA = await createMaster('Block A');
            blockB = await createMaster('Block B');

            // Storage 3 is linked to the first unit before the others exist
            await createProperty('Storage 3', blockA);
            firstUnitId = (await createSubEntity('Unit 0', blockA)).id;

            await createProperty('Parking 1', blockA);
            await createProperty('Parking 2', blockA);
            await createProperty('Garden 4', blockB);
        });

        it('links the master\'s unlinked properties and leaves linked ones alone', async () => {
            const unit = await createSubEntity('Unit 1', blockA);
            secondUnitId = unit.id;

            expect(unit.masterId).toBe(blockA);
            expect(await links(blockA)).toEqual({
                'Storage 3': firstUnitId,
                'Parking 1': secondUnitId,
                'Parking 2': secondUnitId,
            });
        });

        it('does not touch properties of other masters', async () => {
            expect(await links(blockB)).toEqual({ 'Garden 4': null });
        });

        it('links nothing more when another sub-entity is created for a fully linked master', async () => {
            await createSubEntity('Unit 2', blockA);

            expect(await links(blockA)).toEqual({
                'Storage 3': firstUnitId,
                'Parking 1': secondUnitId,
                'Parking 2': secondUnitId,
            });
        });

        it('succeeds for a master without properties', async () => {
            const emptyBlock = await createMaster('Block C');

            const unit = await createSubEntity('Unit 3', emptyBlock);

            expect(unit.masterId).toBe(emptyBlock);
            expect(await links(emptyBlock)).toEqual({});
        });

        it('links nothing for a sub-entity without a master', async () => {
            const unit = await createSubEntity('Unit 4');

            expect(unit.masterId).toBeNull();
            expect(await links(blockB)).toEqual({ 'Garden 4': null });
        });
    });

    describe('when an update fails', () => {
        const originalUpdate = Repository.prototype.update;

        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('rolls back the whole mutation', async () => {
            const blockD = await createMaster('Block D');
            await createProperty('Parking 5', blockD);
            await createProperty('Parking 6', blockD);

            let propertyUpdates = 0;
            vi.spyOn(Repository.prototype, 'update').mockImplementation(function (
                this: Repository<ObjectLiteral>,
                criteria,
                partialEntity,
            ) {
                if (this.metadata.target === Property && ++propertyUpdates === 2) {
                    return Promise.reject(new Error('disk full'));
                }
                return originalUpdate.call(this, criteria, partialEntity);
            });

            await expect(createSubEntity('Unit 5', blockD)).rejects.toThrow();

            expect(propertyUpdates).toBe(2);
            expect(await links(blockD)).toEqual({ 'Parking 5': null, 'Parking 6': null });
        });
    });
});
