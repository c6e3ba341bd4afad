import { isReportType } from '../../reportService';
import { compact, readString, readStringArray, readTimestamp } from '../common/fields';
import {
  CursorPageRequest,
  CursorPageResult,
  normalizeLimit,
  normalizeSortDirection,
  toCursorPage,
  startAfterCursor,
} from '../common/pagination';
import type {
  ReportRecord,
  ReportRepository,
  ReportStatus,
  ReportUpdate,
} from './ReportRepository';

const REPORT_STATUSES: readonly ReportStatus[] = ['pending', 'processing', 'completed', 'failed'];

function readStatus(data: FirebaseFirestore.DocumentData): ReportStatus {
  return REPORT_STATUSES.find((status) => status === data.status) ?? 'pending';
}

function mapReportData(id: string, data: FirebaseFirestore.DocumentData): ReportRecord {
  const type = data.type;
  return {
    id,
    userId: readString(data, 'userId') ?? '',
    type: isReportType(type) ? type : 'birth_chart',
    title: readString(data, 'title') ?? '',
    summary: readString(data, 'summary') ?? '',
    content: readString(data, 'content') ?? '',
    keyInsights: readStringArray(data, 'keyInsights'),
    status: readStatus(data),
    generatedAt: readTimestamp(data, 'generatedAt'),
    createdAt: readTimestamp(data, 'createdAt'),
    updatedAt: readTimestamp(data, 'updatedAt'),
  };
}

export class FirestoreReportRepository implements ReportRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  async create(
    userId: string,
    input: { type: ReportRecord['type']; title: string },
    now: Date,
  ): Promise<ReportRecord> {
    const payload = {
      userId,
      type: input.type,
      title: input.title,
      summary: '',
      content: '',
      keyInsights: [],
      status: 'pending' as const,
      generatedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    const docRef = await this.db.collection('reports').add(payload);

    return mapReportData(docRef.id, payload);
  }

  async getById(reportId: string): Promise<ReportRecord | null> {
    const doc = await this.db.collection('reports').doc(reportId).get();
    if (!doc.exists) {
      return null;
    }
    return mapReportData(doc.id, doc.data() ?? {});
  }

  async update(reportId: string, updates: ReportUpdate, now: Date): Promise<ReportRecord | null> {
    const docRef = this.db.collection('reports').doc(reportId);
    const doc = await docRef.get();
    if (!doc.exists) {
      return null;
    }

    await docRef.update(compact({ ...updates, updatedAt: now }));
    const updatedDoc = await docRef.get();
    return mapReportData(reportId, updatedDoc.data() ?? {});
  }

  async listByUser(
    userId: string,
    options: CursorPageRequest,
  ): Promise<CursorPageResult<ReportRecord>> {
    const limit = normalizeLimit(options.limit);
    let query = this.db
      .collection('reports')
      .where('userId', '==', userId)
      .orderBy('createdAt', normalizeSortDirection(options.sortDirection))
      .limit(limit + 1);

    query = await startAfterCursor(query, this.db.collection('reports'), options.cursor, userId);

    const snapshot = await query.get();
    return toCursorPage(snapshot.docs, limit, (doc) => mapReportData(doc.id, doc.data()));
  }
}
