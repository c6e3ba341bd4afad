/**
 * Detailed Report Service
 *
 * Builds the stored content of a detailed report from the ephemeris and the
 * dasha timeline, and renders a finished report to PDF.
 */

import * as functions from 'firebase-functions';
import PdfPrinter from 'pdfmake';
import type { Content, TDocumentDefinitions } from 'pdfmake/interfaces';
import { buildCompleteResponse, isDashaError } from './astro/dashaAssembler';
import { BodyPosition, ChartPositions, EphemerisService, getEphemerisService } from './astro/ephemeris';
import type { ParsedBirthData } from '../utils/birthData';

// =============================================================================
// Types
// =============================================================================

export type ReportType = 'birth_chart' | 'love_forecast' | 'career_forecast' | 'year_ahead';

export const REPORT_TYPES: readonly ReportType[] = [
    'birth_chart',
    'love_forecast',
    'career_forecast',
    'year_ahead',
];

export const REPORT_TITLES: Record<ReportType, string> = {
    birth_chart: 'Complete Birth Chart Reading',
    love_forecast: 'Love Forecast',
    career_forecast: 'Career Forecast',
    year_ahead: 'Year Ahead Overview',
};

export interface GeneratedReport {
    reportType: ReportType;
    title: string;
    summary: string;
    keyInsights: string[];
    content: string;
}

export interface PrintableReport {
    title: string;
    summary: string;
    keyInsights: string[];
    generatedAt: string | null;
    content: string;
}

// =============================================================================
// Fonts Configuration
// =============================================================================

const fonts = {
    Helvetica: {
        normal: 'Helvetica',
        bold: 'Helvetica-Bold',
        italics: 'Helvetica-Oblique',
        bolditalics: 'Helvetica-BoldOblique',
    },
};

const printer = new PdfPrinter(fonts);

const COLORS = {
    primary: '#4B3F72',
    text: '#1F2937',
    muted: '#6B7280',
};

// =============================================================================
// Content
// =============================================================================

function formatPosition(position: BodyPosition | null | undefined): string | null {
    if (!position) return null;
    return `${position.sign} ${position.degree.toFixed(2)}°`;
}

function findBody(chart: ChartPositions, id: string): BodyPosition | undefined {
    return chart.bodies.find((body) => body.id === id);
}

export class ReportService {
    constructor(
        private readonly ephemeris: EphemerisService = getEphemerisService(),
        private readonly now: () => Date = () => new Date(),
    ) {}

    generate(reportType: ReportType, birthData: ParsedBirthData | null): GeneratedReport {
        const title = REPORT_TITLES[reportType];
        const generatedAt = this.now().toISOString();

        if (!birthData) {
            const summary = `Personalized ${reportType.replace(/_/g, ' ')} based on provided details.`;
            const keyInsights = [
                'Add full birth date, time, and location for a detailed reading',
                'Kundali (sidereal) and Zodiac (tropical) insights can differ',
            ];
            return {
                reportType,
                title,
                summary,
                keyInsights,
                content: JSON.stringify({
                    reportType,
                    title,
                    generatedAt,
                    summary,
                    keyInsights,
                    zodiac: null,
                    kundali: null,
                    dashas: null,
                }),
            };
        }

        const location = { latitude: birthData.latitude, longitude: birthData.longitude };
        const western = this.ephemeris.getPositions(birthData.instant, { ...location, system: 'western' });
        const vedic = this.ephemeris.getPositions(birthData.instant, { ...location, system: 'vedic' });

        const zodiac = {
            sun: formatPosition(findBody(western, 'sun')),
            moon: formatPosition(findBody(western, 'moon')),
            ascendant: formatPosition(western.ascendant),
        };
        const kundali = {
            sun: formatPosition(findBody(vedic, 'sun')),
            moon: formatPosition(findBody(vedic, 'moon')),
            lagna: formatPosition(vedic.ascendant),
            rahu: formatPosition(findBody(vedic, 'rahu')),
            ketu: formatPosition(findBody(vedic, 'ketu')),
        };

        const dasha = buildCompleteResponse(
            birthData.instant,
            this.ephemeris.getSiderealMoonLongitude(birthData.instant),
            this.now(),
        );
        const dashas = isDashaError(dasha)
            ? null
            : { starting: dasha.starting_dasha, mahadasha: dasha.mahadasha, antardasha: dasha.antardasha };
        const mahadashaLord = dashas?.mahadasha.lord ?? 'Unknown';

        let summary: string;
        let keyInsights: string[];
        switch (reportType) {
            case 'love_forecast':
                summary = `Love themes are highlighted through Venus and the current dasha influences. Zodiac: ${zodiac.sun}. Kundali: ${kundali.sun}.`;
                keyInsights = [
                    'Look for relationship lessons during your current dasha period',
                    `Kundali Moon: ${kundali.moon}`,
                ];
                break;
            case 'career_forecast':
                summary = `Career timing is influenced by Saturn themes and your current dasha. Zodiac: ${zodiac.sun}. Kundali: ${kundali.sun}.`;
                keyInsights = [
                    'Career growth tends to accelerate in Jupiter/Saturn-linked periods',
                    `Current Mahadasha: ${mahadashaLord}`,
                ];
                break;
            case 'year_ahead':
                summary = `Your year-ahead overview blends tropical transits with kundali dashas for timing. Zodiac: ${zodiac.sun}. Kundali: ${kundali.sun}.`;
                keyInsights = [
                    'Use dashas for timing and transits for day-to-day tone',
                    `Lagna (kundali): ${kundali.lagna ?? 'Add birth location to compute'}`,
                ];
                break;
            default:
                summary = `Your core blueprint blends Zodiac (tropical) and Kundali (sidereal). Zodiac Sun: ${zodiac.sun}. Kundali Sun: ${kundali.sun}.`;
                keyInsights = [
                    `Zodiac Moon: ${zodiac.moon}`,
                    `Kundali Moon: ${kundali.moon}`,
                    `Current Mahadasha: ${mahadashaLord}`,
                ];
        }

        return {
            reportType,
            title,
            summary,
            keyInsights,
            content: JSON.stringify({
                reportType,
                title,
                generatedAt,
                summary,
                keyInsights,
                zodiac,
                kundali,
                dashas,
                westernPlanets: western.bodies,
                vedicPlanets: vedic.bodies,
            }),
        };
    }
}

// =============================================================================
// PDF
// =============================================================================

export function buildReportDocument(report: PrintableReport): TDocumentDefinitions {
    const insights: Content = report.keyInsights.length > 0
        ? { ul: report.keyInsights, style: 'body', margin: [0, 0, 0, 16] }
        : { text: 'No insights available yet.', style: 'muted', margin: [0, 0, 0, 16] };

    return {
        info: { title: report.title },
        defaultStyle: { font: 'Helvetica', fontSize: 10, color: COLORS.text },
        content: [
            { text: report.title, style: 'title' },
            {
                text: report.generatedAt ? `Generated ${report.generatedAt.slice(0, 10)}` : 'Generation pending',
                style: 'muted',
                margin: [0, 0, 0, 16],
            },
            { text: 'Summary', style: 'heading' },
            { text: report.summary, style: 'body', margin: [0, 0, 0, 16] },
            { text: 'Key insights', style: 'heading' },
            insights,
            {
                text: 'For entertainment purposes only. Not professional advice.',
                style: 'muted',
            },
        ],
        styles: {
            title: { fontSize: 20, bold: true, color: COLORS.primary, margin: [0, 0, 0, 4] },
            heading: { fontSize: 13, bold: true, color: COLORS.primary, margin: [0, 0, 0, 6] },
            body: { fontSize: 10, lineHeight: 1.3 },
            muted: { fontSize: 8, italics: true, color: COLORS.muted },
        },
        pageMargins: [40, 40, 40, 40],
    };
}

export async function renderReportPdf(report: PrintableReport): Promise<Buffer> {
    functions.logger.info(`[reports] Rendering PDF for "${report.title}"`);
    const pdfDoc = printer.createPdfKitDocument(buildReportDocument(report));

    return new Promise((resolve, reject) => {
        const chunks: Uint8Array[] = [];
        pdfDoc.on('data', (chunk: Uint8Array) => chunks.push(chunk));
        pdfDoc.on('end', () => resolve(Buffer.concat(chunks)));
        pdfDoc.on('error', reject);
        pdfDoc.end();
    });
}

export function isReportType(value: unknown): value is ReportType {
    return typeof value === 'string' && REPORT_TYPES.some((type) => type === value);
}

let reportServiceInstance: ReportService | null = null;

export const getReportService = (): ReportService => {
    if (!reportServiceInstance) {
        reportServiceInstance = new ReportService();
    }
    return reportServiceInstance;
};
