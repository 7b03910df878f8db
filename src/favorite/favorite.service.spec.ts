import { Transaction, UniqueConstraintError } from 'sequelize';
import { FavoriteService } from './favorite.service';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------
const makeEvent = (overrides: Record<string, any> = {}) => ({
    id: 7,
    title: 'Harbour lights walk',
    isDeleted: false,
    ...overrides,
});

const makeFavorite = (overrides: Record<string, any> = {}) => ({
    id: 1,
    eventId: 7,
    userId: 3,
    createdAt: new Date('2030-01-01T00:00:00.000Z'),
    ...overrides,
});

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------
const makeFavoriteModel = (overrides: Partial<Record<string, jest.Mock>> = {}) => ({
    findOrCreate: jest.fn(),
    findOne: jest.fn(),
    findAll: jest.fn(),
    destroy: jest.fn(),
    count: jest.fn(),
    ...overrides,
});

const makeEventModel = (overrides: Partial<Record<string, jest.Mock>> = {}) => ({
    findByPk: jest.fn(),
    findAll: jest.fn(),
    ...overrides,
});

const transactionHandle = { id: 'tx-1' };

const makeSequelize = () => ({
    transaction: jest.fn((work: (transaction: typeof transactionHandle) => Promise<unknown>) =>
        work(transactionHandle),
    ),
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------
describe('FavoriteService', () => {
    let service: FavoriteService;
    let favoriteModel: ReturnType<typeof makeFavoriteModel>;
    let eventModel: ReturnType<typeof makeEventModel>;
    let sequelize: ReturnType<typeof makeSequelize>;

    beforeEach(() => {
        favoriteModel = makeFavoriteModel();
        eventModel = makeEventModel();
        sequelize = makeSequelize();
        service = new FavoriteService(favoriteModel as any, eventModel as any, sequelize as any);
    });

    // ─── favorite ─────────────────────────────────────────────────────────────

    describe('favorite', () => {
        it('creates the favorite on first call', async () => {
            const favorite = makeFavorite();
            eventModel.findByPk.mockResolvedValue(makeEvent());
            favoriteModel.findOrCreate.mockResolvedValue([favorite, true]);

            const result = await service.favorite(7, 3);

            expect(result).toEqual({ ok: true, value: { favorite, created: true } });
        });

        it('checks the event and inserts inside one transaction holding a share lock', async () => {
            eventModel.findByPk.mockResolvedValue(makeEvent());
            favoriteModel.findOrCreate.mockResolvedValue([makeFavorite(), true]);

            await service.favorite(7, 3);

            expect(sequelize.transaction).toHaveBeenCalledTimes(1);
            expect(eventModel.findByPk).toHaveBeenCalledWith(7, {
                transaction: transactionHandle,
                lock: Transaction.LOCK.SHARE,
            });
            expect(favoriteModel.findOrCreate).toHaveBeenCalledWith({
                where: { eventId: 7, userId: 3 },
                defaults: { eventId: 7, userId: 3 },
                transaction: transactionHandle,
            });
        });

        it('is idempotent', async () => {
            const favorite = makeFavorite();
            eventModel.findByPk.mockResolvedValue(makeEvent());
            favoriteModel.findOrCreate.mockResolvedValue([favorite, false]);

            const result = await service.favorite(7, 3);

            expect(result).toEqual({ ok: true, value: { favorite, created: false } });
        });

        it('returns NotFound for a missing event', async () => {
            eventModel.findByPk.mockResolvedValue(null);

            const result = await service.favorite(7, 3);

            expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: 'Event not found.' } });
            expect(favoriteModel.findOrCreate).not.toHaveBeenCalled();
        });

        it('refuses deleted events', async () => {
            eventModel.findByPk.mockResolvedValue(makeEvent({ isDeleted: true }));

            const result = await service.favorite(7, 3);

            expect(result).toEqual({
                ok: false,
                error: { kind: 'CannotFavoriteDeleted', message: 'A deleted event cannot be favorited.' },
            });
        });

        it('re-reads the row after losing a creation race', async () => {
            const favorite = makeFavorite();
            eventModel.findByPk.mockResolvedValue(makeEvent());
            favoriteModel.findOrCreate.mockRejectedValue(new UniqueConstraintError({ message: 'duplicate key' }));
            favoriteModel.findOne.mockResolvedValue(favorite);

            const result = await service.favorite(7, 3);

            expect(result).toEqual({ ok: true, value: { favorite, created: false } });
        });

        it('propagates unexpected storage errors', async () => {
            const failure = new Error('connection terminated');
            eventModel.findByPk.mockResolvedValue(makeEvent());
            favoriteModel.findOrCreate.mockRejectedValue(failure);

            await expect(service.favorite(7, 3)).rejects.toBe(failure);
        });
    });

    // ─── unfavorite / isFavorited ─────────────────────────────────────────────

    describe('unfavorite', () => {
        it('reports whether a row was removed', async () => {
            favoriteModel.destroy.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

            expect(await service.unfavorite(7, 3)).toEqual({ ok: true, value: { removed: true } });
            expect(await service.unfavorite(7, 3)).toEqual({ ok: true, value: { removed: false } });
            expect(favoriteModel.destroy).toHaveBeenCalledWith({ where: { eventId: 7, userId: 3 } });
        });
    });

    describe('isFavorited', () => {
        it('checks for an existing row', async () => {
            favoriteModel.count.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

            expect(await service.isFavorited(7, 3)).toBe(true);
            expect(await service.isFavorited(7, 4)).toBe(false);
        });
    });

    // ─── listFavorites ────────────────────────────────────────────────────────

    describe('listFavorites', () => {
        it('pairs favorites with their live events, keeping favorite order', async () => {
            const newer = makeFavorite({ id: 2, eventId: 8, createdAt: new Date('2030-02-01T00:00:00.000Z') });
            const onDeleted = makeFavorite({ id: 3, eventId: 9 });
            const older = makeFavorite();
            favoriteModel.findAll.mockResolvedValue([newer, onDeleted, older]);
            eventModel.findAll.mockResolvedValue([makeEvent(), makeEvent({ id: 8, title: 'Night market' })]);

            const favorites = await service.listFavorites(3);

            expect(favoriteModel.findAll).toHaveBeenCalledWith({
                where: { userId: 3 },
                order: [
                    ['createdAt', 'DESC'],
                    ['id', 'DESC'],
                ],
            });
            expect(favorites.map(({ event, favoritedAt }) => [event.title, favoritedAt])).toEqual([
                ['Night market', newer.createdAt],
                ['Harbour lights walk', older.createdAt],
            ]);
        });

        it('skips the event lookup when nothing is favorited', async () => {
            favoriteModel.findAll.mockResolvedValue([]);

            expect(await service.listFavorites(3)).toEqual([]);
            expect(eventModel.findAll).not.toHaveBeenCalled();
        });
    });
});
