import { Router } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, requireAuth } from '../middlewares/auth';
import { sendRouteError } from '../middlewares/errorHandler';
import { createDomainServiceContainer } from '../services/domain/serviceContainer';
import { DEFAULT_PAGE_LIMIT } from '../services/repositories/common/pagination';
import {
  GeneratedReport,
  getReportService,
  isReportType,
  REPORT_TITLES,
  REPORT_TYPES,
  renderReportPdf,
} from '../services/reportService';
import { parseBirthData } from '../utils/birthData';

export const reportsRouter = Router();

const getDb = () => admin.firestore();
const getServices = () => createDomainServiceContainer({ db: getDb() });

const generateReportSchema = z.object({
  reportType: z.string().min(1),
  birthData: z.record(z.unknown()).optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
});

/**
 * POST /v1/reports/generate
 * Creates a report and builds its content; the stored status walks
 * pending -> processing -> completed (or failed)
 */
reportsRouter.post('/generate', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    const body = generateReportSchema.parse(req.body ?? {});
    const reportType = body.reportType;
    if (!isReportType(reportType)) {
      res.status(400).json({
        code: 'invalid_report_type',
        message: `reportType must be one of ${REPORT_TYPES.join(', ')}`,
      });
      return;
    }

    const birth = body.birthData
      ? parseBirthData({ birthData: body.birthData }, { requireCoords: false })
      : null;

    const reportService = getServices().reportService;
    const pending = await reportService.createPending(
      userId,
      reportType,
      REPORT_TITLES[reportType],
      new Date(),
    );
    await reportService.markProcessing(pending.id, new Date());

    let generated: GeneratedReport;
    try {
      generated = getReportService().generate(reportType, birth);
    } catch (generationError) {
      functions.logger.error(`[reports] Generation failed for report ${pending.id}:`, generationError);
      await reportService.fail(pending.id, new Date());
      res.status(500).json({
        code: 'report_generation_failed',
        message: 'Failed to generate report',
        details: { reportId: pending.id },
      });
      return;
    }

    const completed = await reportService.complete(pending.id, generated, new Date());
    functions.logger.info(`[reports] Completed ${reportType} report ${pending.id} for user ${userId}`);
    res.status(201).json(completed);
  } catch (error) {
    sendRouteError(res, error, { tag: 'reports', message: 'Failed to generate report' });
  }
});

/**
 * GET /v1/reports/user/:userId
 * A user may only list their own reports
 */
reportsRouter.get('/user/:userId', requireAuth, async (req: AuthRequest, res) => {
  try {
    const userId = req.user!.uid;
    if (req.params.userId !== userId) {
      res.status(403).json({
        code: 'forbidden',
        message: 'You do not have access to these reports',
      });
      return;
    }

    const query = listQuerySchema.parse(req.query);
    const page = await getServices().reportService.listForUser(userId, {
      limit: query.limit ?? DEFAULT_PAGE_LIMIT,
      cursor: query.cursor,
    });

    if (page.nextCursor) {
      res.set('X-Next-Cursor', page.nextCursor);
    }
    res.json(page.items);
  } catch (error) {
    sendRouteError(res, error, { tag: 'reports', message: 'Failed to fetch reports' });
  }
});

/**
 * GET /v1/reports/:id/status
 */
reportsRouter.get('/:id/status', requireAuth, async (req: AuthRequest, res) => {
  try {
    const report = await getServices().reportService.getForUser(req.user!.uid, req.params.id);

    if (!report) {
      res.status(404).json({
        code: 'not_found',
        message: 'Report not found',
      });
      return;
    }

    res.json({
      reportId: report.id,
      status: report.status,
      generatedAt: report.generatedAt,
    });
  } catch (error) {
    sendRouteError(res, error, { tag: 'reports', message: 'Failed to fetch report status' });
  }
});

/**
 * GET /v1/reports/:id/pdf
 */
reportsRouter.get('/:id/pdf', requireAuth, async (req: AuthRequest, res) => {
  try {
    const report = await getServices().reportService.getForUser(req.user!.uid, req.params.id);

    if (!report) {
      res.status(404).json({
        code: 'not_found',
        message: 'Report not found',
      });
      return;
    }

    if (report.status !== 'completed') {
      res.status(409).json({
        code: 'report_not_ready',
        message: 'Report is not ready yet',
        details: { status: report.status },
      });
      return;
    }

    const pdf = await renderReportPdf({
      title: report.title,
      summary: report.summary,
      keyInsights: report.keyInsights,
      generatedAt: report.generatedAt,
      content: report.content,
    });

    res.set('Content-Type', 'application/pdf');
    res.set('Content-Disposition', `attachment; filename="report-${report.id}.pdf"`);
    res.send(pdf);
  } catch (error) {
    sendRouteError(res, error, { tag: 'reports', message: 'Failed to render report PDF' });
  }
});
