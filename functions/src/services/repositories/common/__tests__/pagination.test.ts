import { InMemoryFirestore } from '../../__tests__/inMemoryFirestore';
import { InvalidCursorError, normalizeLimit, startAfterCursor } from '../pagination';

describe('pagination helpers', () => {
  it('clamps page limits', () => {
    expect(normalizeLimit(0)).toBe(50);
    expect(normalizeLimit(Number.NaN)).toBe(50);
    expect(normalizeLimit(7.9)).toBe(7);
    expect(normalizeLimit(500)).toBe(100);
  });

  describe('startAfterCursor', () => {
    const seedReports = () => {
      const fake = new InMemoryFirestore();
      fake.seed('reports/report-1', { userId: 'user-1', createdAt: new Date('2024-01-01T00:00:00Z') });
      fake.seed('reports/report-2', { userId: 'user-1', createdAt: new Date('2024-01-02T00:00:00Z') });
      fake.seed('reports/report-3', { userId: 'user-2', createdAt: new Date('2024-01-03T00:00:00Z') });
      return fake.asFirestore();
    };

    it('leaves the query alone without a cursor', async () => {
      const db = seedReports();
      const query = db.collection('reports').orderBy('createdAt', 'asc');

      await expect(startAfterCursor(query, db.collection('reports'), '   ')).resolves.toBe(query);
    });

    it('continues after the cursor document', async () => {
      const db = seedReports();
      const query = await startAfterCursor(
        db.collection('reports').where('userId', '==', 'user-1').orderBy('createdAt', 'asc'),
        db.collection('reports'),
        'report-1',
        'user-1',
      );

      const snapshot = await query.get();
      expect(snapshot.docs.map((doc) => doc.id)).toEqual(['report-2']);
    });

    it('rejects unknown cursors and cursors owned by someone else', async () => {
      const db = seedReports();
      const query = db.collection('reports').orderBy('createdAt', 'asc');

      await expect(startAfterCursor(query, db.collection('reports'), 'missing')).rejects.toThrow(
        InvalidCursorError,
      );
      await expect(
        startAfterCursor(query, db.collection('reports'), 'report-3', 'user-1'),
      ).rejects.toMatchObject({ code: 'invalid_cursor', cursor: 'report-3' });
    });
  });
});
