/**
 * Report and Bookmark Models
 */

import type { BirthDataInput } from './astrology';

export type ReportType = 'birth_chart' | 'love_forecast' | 'career_forecast' | 'year_ahead';

export type ReportStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface DetailedReport {
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
}

export interface GenerateReportRequest {
  reportType: ReportType;
  birthData?: BirthDataInput;
}

export interface ReportStatusResponse {
  reportId: string;
  status: ReportStatus;
  generatedAt: string | null;
}

export interface BookmarkedReading {
  id: string;
  readingDate: string;
  type: string;
  title: string;
  content: string;
  createdAt: string | null;
}

export type CreateBookmarkRequest = Omit<BookmarkedReading, 'id' | 'createdAt'>;
