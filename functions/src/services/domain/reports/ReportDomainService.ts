import type { GeneratedReport, ReportType } from '../../reportService';
import type { CursorPageRequest } from '../../repositories/common/pagination';
import type { ReportRecord, ReportRepository } from '../../repositories/reports/ReportRepository';

export class ReportDomainService {
  constructor(private readonly reportRepository: ReportRepository) {}

  async createPending(
    userId: string,
    type: ReportType,
    title: string,
    now: Date,
  ): Promise<ReportRecord> {
    return this.reportRepository.create(userId, { type, title }, now);
  }

  async markProcessing(reportId: string, now: Date): Promise<ReportRecord | null> {
    return this.reportRepository.update(reportId, { status: 'processing' }, now);
  }

  async complete(
    reportId: string,
    report: GeneratedReport,
    now: Date,
  ): Promise<ReportRecord | null> {
    return this.reportRepository.update(
      reportId,
      {
        status: 'completed',
        summary: report.summary,
        keyInsights: report.keyInsights,
        content: report.content,
        generatedAt: now,
      },
      now,
    );
  }

  async fail(reportId: string, now: Date): Promise<ReportRecord | null> {
    return this.reportRepository.update(reportId, { status: 'failed' }, now);
  }

  async getForUser(userId: string, reportId: string): Promise<ReportRecord | null> {
    const report = await this.reportRepository.getById(reportId);

    if (!report || report.userId !== userId) {
      return null;
    }

    return report;
  }

  async listForUser(userId: string, options: CursorPageRequest) {
    return this.reportRepository.listByUser(userId, options);
  }
}
