/**
 * Entry Store Tests
 */

import { openDatabase, SqliteDatabase } from '../database';
import { EntryStore, createEntryStore } from '../entryStore';
import { createUserStore } from '../userStore';
import { StorageErrorCode } from '../errors';
import { User } from '../../../shared/types';

describe('EntryStore', () => {
    let db: SqliteDatabase;
    let entryStore: EntryStore;
    let alice: User;
    let bob: User;

    beforeEach(async () => {
        db = openDatabase(':memory:');
        entryStore = createEntryStore(db);
        const userStore = createUserStore(db);
        alice = await userStore.createUser('alice', 'hash-a');
        bob = await userStore.createUser('bob', 'hash-b');
    });

    afterEach(() => {
        db.close();
    });

    describe('createEntry', () => {
        it('should store all fields and assign an id and timestamp', async () => {
            const entry = await entryStore.createEntry({
                userId: alice.id,
                category: 'smoking',
                description: 'Craving after lunch.',
                response: 'Take a short walk.',
            });

            expect(entry.id).toBeDefined();
            expect(entry.createdAt).toBeInstanceOf(Date);

            const [stored] = await entryStore.listEntriesForUser(alice.id);
            expect(stored).toEqual(entry);
        });

        it('should reject an entry whose owner does not exist', async () => {
            await expect(
                entryStore.createEntry({
                    userId: 'no-such-user',
                    category: 'smoking',
                    description: 'text',
                    response: 'reply',
                })
            ).rejects.toMatchObject({
                name: 'StorageError',
                code: StorageErrorCode.UNKNOWN_OWNER,
                message: 'No user with id no-such-user',
            });
            expect(await entryStore.countEntriesForUser('no-such-user')).toBe(0);
        });
    });

    describe('listEntriesForUser', () => {
        it('should return an empty list for a user without entries', async () => {
            expect(await entryStore.listEntriesForUser(alice.id)).toEqual([]);
        });

        it('should list entries newest first', async () => {
            for (const category of ['first', 'second', 'third']) {
                await entryStore.createEntry({
                    userId: alice.id,
                    category,
                    description: 'text',
                    response: 'reply',
                });
            }

            const entries = await entryStore.listEntriesForUser(alice.id);
            expect(entries.map((entry) => entry.category)).toEqual(['third', 'second', 'first']);
        });

        it("should never include another user's entries", async () => {
            await entryStore.createEntry({ userId: alice.id, category: 'gambling', description: 'a', response: 'r' });
            await entryStore.createEntry({ userId: bob.id, category: 'smoking', description: 'b', response: 'r' });
            await entryStore.createEntry({ userId: alice.id, category: 'alcohol', description: 'c', response: 'r' });

            const bobEntries = await entryStore.listEntriesForUser(bob.id);
            const aliceEntries = await entryStore.listEntriesForUser(alice.id);

            expect(bobEntries.map((entry) => entry.category)).toEqual(['smoking']);
            expect(aliceEntries.every((entry) => entry.userId === alice.id)).toBe(true);
            expect(aliceEntries).toHaveLength(2);
        });
    });

    describe('countEntriesForUser', () => {
        it('should count only the given user', async () => {
            await entryStore.createEntry({ userId: alice.id, category: 'x', description: 'a', response: 'r' });
            await entryStore.createEntry({ userId: alice.id, category: 'y', description: 'b', response: 'r' });

            expect(await entryStore.countEntriesForUser(alice.id)).toBe(2);
            expect(await entryStore.countEntriesForUser(bob.id)).toBe(0);
        });
    });
});
