import ExcelJS from "exceljs";
import type { Cell, Workbook, Worksheet } from "exceljs";
import fs from "node:fs/promises";
import path from "node:path";
import { statusLabel, type DbSubmission, type PeriodEntry, type PeriodProgress } from "@replyledger/shared";
import { ExternalError } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import { createKeyedQueue } from "./keyedQueue.js";
import type { ReportSink } from "./reportSink.js";

const SHEET_NAME = "Reply Tracking";
const HEADER_FILL = { type: "pattern", pattern: "solid", fgColor: { argb: "FF1DA1F2" } } as const;
const SUMMARY_FILL = { type: "pattern", pattern: "solid", fgColor: { argb: "FF4472C4" } } as const;
const HEADER_FONT = { bold: true, color: { argb: "FFFFFFFF" } } as const;
const LINK_FONT = { color: { argb: "FF0000FF" }, underline: true } as const;
const CENTER = { horizontal: "center", vertical: "middle" } as const;

export function reportFileName(periodId: string): string {
  return `tracking_${periodId}.xlsx`;
}

function styleHeader(cell: Cell, fill: typeof HEADER_FILL | typeof SUMMARY_FILL = HEADER_FILL) {
  cell.font = HEADER_FONT;
  cell.fill = fill;
  cell.alignment = CENTER;
}

// Column of `day` in the header row; appended when the period was extended past its template.
function dayColumn(sheet: Worksheet, day: string): number {
  for (let c = 2; c <= sheet.columnCount; c++) {
    if (sheet.getCell(1, c).value === day) return c;
  }
  const col = Math.max(2, sheet.columnCount + 1);
  const header = sheet.getCell(1, col);
  header.value = day;
  styleHeader(header);
  sheet.getColumn(col).width = 15;
  return col;
}

function fillTrackingSheet(sheet: Worksheet, targetPerDay: number, days: string[]) {
  const corner = sheet.getCell(1, 1);
  corner.value = "Reply #";
  styleHeader(corner);
  sheet.getColumn(1).width = 10;
  days.forEach((day, idx) => {
    const cell = sheet.getCell(1, idx + 2);
    cell.value = day;
    styleHeader(cell);
    sheet.getColumn(idx + 2).width = 15;
  });
  for (let n = 1; n <= targetPerDay; n++) {
    const cell = sheet.getCell(n + 1, 1);
    cell.value = n;
    cell.font = { bold: true };
    cell.alignment = CENTER;
  }
}

function setLink(sheet: Worksheet, ordinal: number, col: number, link: string) {
  const label = sheet.getCell(ordinal + 1, 1);
  if (label.value === null) label.value = ordinal;
  const cell = sheet.getCell(ordinal + 1, col);
  cell.value = { text: String(ordinal), hyperlink: link };
  cell.font = LINK_FONT;
  cell.alignment = CENTER;
}

/**
 * One workbook per tracking period under `dir`. Writes to the same workbook are serialized;
 * different periods write in parallel.
 */
export function createExcelReportSink(opts: { dir: string; logger?: Logger }): ReportSink {
  const dir = path.resolve(opts.dir);
  const log = opts.logger ?? baseLogger;
  const files = createKeyedQueue();

  return {
    async generateEmptyTemplate(periodId, targetPerDay, dateRange) {
      const file = path.join(dir, reportFileName(periodId));
      return files.run(file, async () => {
        await fs.mkdir(dir, { recursive: true });
        const wb = new ExcelJS.Workbook();
        fillTrackingSheet(wb.addWorksheet(SHEET_NAME), targetPerDay, dateRange);
        await wb.xlsx.writeFile(file);
        log.info({ evt: "report_template_created", period_id: periodId, file }, "report template created");
        return file;
      });
    },

    async writeRow(periodId, day, ordinal, link) {
      const file = path.join(dir, reportFileName(periodId));
      await files.run(file, async () => {
        const wb = new ExcelJS.Workbook();
        try {
          await wb.xlsx.readFile(file);
        } catch (e) {
          throw new ExternalError("report_unreadable", `Report ${file} could not be opened`, e);
        }
        const sheet = wb.getWorksheet(SHEET_NAME) ?? wb.worksheets[0];
        if (!sheet) throw new ExternalError("report_unreadable", `Report ${file} has no worksheet`);
        setLink(sheet, ordinal, dayColumn(sheet, day), link);
        await wb.xlsx.writeFile(file);
      });
    }
  };
}

export type CombinedReportItem = {
  entry: PeriodEntry;
  progress: PeriodProgress;
  submissions: DbSubmission[];
};

function sheetName(display: string, taken: Set<string>): string {
  const base = display.replace(/[[\]:*?/\\]/g, "").trim().slice(0, 28) || "account";
  let name = base;
  for (let i = 2; taken.has(name.toLowerCase()); i++) name = `${base}-${i}`;
  taken.add(name.toLowerCase());
  return name;
}

function addSummarySheet(wb: Workbook, items: CombinedReportItem[], generatedAt: string) {
  const sheet = wb.addWorksheet("Summary");
  sheet.mergeCells("A1:H1");
  const title = sheet.getCell("A1");
  title.value = `Reply Tracking Summary - Generated ${generatedAt}`;
  title.font = { size: 16, bold: true, color: { argb: "FFFFFFFF" } };
  title.fill = HEADER_FILL;
  title.alignment = CENTER;

  const headers = ["Member", "Handle", "Target/Day", "Period", "Total Replies", "Avg/Day", "Completion %", "Status"];
  headers.forEach((h, idx) => {
    const cell = sheet.getCell(3, idx + 1);
    cell.value = h;
    styleHeader(cell, SUMMARY_FILL);
  });
  items.forEach(({ entry, progress }, idx) => {
    const avg = progress.elapsed_days > 0 ? Math.round((progress.total / progress.elapsed_days) * 10) / 10 : 0;
    sheet.getRow(idx + 4).values = [
      entry.account.display_name,
      `@${entry.account.claimed_handle}`,
      entry.period.target_per_day,
      `${entry.period.start_date} to ${entry.period.end_date}`,
      progress.total,
      avg,
      progress.completion_pct,
      statusLabel(entry.period.status)
    ];
  });
  [20, 18, 12, 26, 14, 10, 14, 12].forEach((w, idx) => {
    sheet.getColumn(idx + 1).width = w;
  });
}

/** Summary sheet plus one tracking sheet per period, returned as an xlsx buffer. */
export async function buildCombinedWorkbook(items: CombinedReportItem[], generatedAt: string, days: (entry: PeriodEntry) => string[]): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  addSummarySheet(wb, items, generatedAt);
  const taken = new Set<string>(["summary"]);
  for (const item of items) {
    const sheet = wb.addWorksheet(sheetName(item.entry.account.display_name, taken));
    fillTrackingSheet(sheet, item.entry.period.target_per_day, days(item.entry));
    for (const s of item.submissions) setLink(sheet, s.ordinal, dayColumn(sheet, s.occurred_on), s.link);
  }
  const out = await wb.xlsx.writeBuffer();
  return Buffer.from(out);
}
