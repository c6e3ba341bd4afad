import type { ReportType } from '../../reportService';
import type { CursorPageRequest, CursorPageResult } from '../common/pagination';

export type ReportStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type ReportRecord = {
  id: string;
  userId: string;
  type: ReportType;
  title: string;
  summary: string;
  content: string;
  keyInsights: string[];
  status: ReportStatus;
  generatedAt: string | null;
  createdAt: string | null;
  updatedAt: string | null;
};

export type ReportUpdate = Partial<{
  status: ReportStatus;
  summary: string;
  content: string;
  keyInsights: string[];
  generatedAt: Date;
}>;

export interface ReportRepository {
  create(
    userId: string,
    input: { type: ReportType; title: string },
    now: Date,
  ): Promise<ReportRecord>;
  getById(reportId: string): Promise<ReportRecord | null>;
  update(reportId: string, updates: ReportUpdate, now: Date): Promise<ReportRecord | null>;
  listByUser(userId: string, options: CursorPageRequest): Promise<CursorPageResult<ReportRecord>>;
}
