/**
 * Workbook Renderer
 *
 * Turns a PresentationModel into a three-sheet .xlsx workbook:
 * 1. Checklist: header row, one row per document, priority/status fills,
 *    conditional formatting and dropdown validation on priority and status,
 *    auto-filter, frozen header
 * 2. Summary: deal metadata, counts by category and by priority
 * 3. Instructions: how to use, status definitions, timeline, advisor contacts
 *
 * The renderer reads only the PresentationModel. It never sees the deal
 * context, the rule base or the translation table.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import ExcelJS from 'exceljs';
import type { Cell, ConditionalFormattingRule, Font, Workbook, Worksheet } from 'exceljs';
import type { PresentationModel } from '../presentation/index.js';
import {
  BODY_FONT,
  BOLD_FONT,
  HEADER_FILL,
  HEADER_FONT,
  MAX_COLUMN_WIDTH,
  MIN_COLUMN_WIDTH,
  PRIORITY_COLORS,
  STATUS_COLORS,
  SUBTITLE_FONT,
  THIN_BORDER,
  TITLE_FONT,
  conditionalFill,
  priorityFill,
  statusFill,
} from './styles.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Checklist sheet column positions (1-based) */
const COL = {
  category: 1,
  name: 2,
  required: 3,
  priority: 4,
  receivedDate: 5,
  status: 6,
  responsible: 7,
  comments: 8,
} as const;

const CHECKLIST_LAST_COLUMN = 'H';
const NAME_COLUMN_WIDTH = 55;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function styleHeaderCell(cell: Cell): void {
  cell.fill = HEADER_FILL;
  cell.font = HEADER_FONT;
  cell.border = THIN_BORDER;
  cell.alignment = { horizontal: 'center', vertical: 'middle' };
}

function writeHeaderRow(sheet: Worksheet, rowNumber: number, headers: readonly string[]): void {
  headers.forEach((header, index) => {
    const cell = sheet.getCell(rowNumber, index + 1);
    cell.value = header;
    styleHeaderCell(cell);
  });
}

function writeBodyCell(
  sheet: Worksheet,
  rowNumber: number,
  column: number,
  value: string | number,
  font: Partial<Font> = BODY_FONT,
): Cell {
  const cell = sheet.getCell(rowNumber, column);
  cell.value = value;
  cell.font = font;
  cell.border = THIN_BORDER;
  return cell;
}

function writeSubtitle(sheet: Worksheet, rowNumber: number, text: string): void {
  const cell = sheet.getCell(rowNumber, 1);
  cell.value = text;
  cell.font = SUBTITLE_FONT;
}

/**
 * Fit each column to its longest value, clamped to [MIN_COLUMN_WIDTH, MAX_COLUMN_WIDTH].
 */
export function autoWidth(sheet: Worksheet): void {
  for (let col = 1; col <= sheet.columnCount; col++) {
    const column = sheet.getColumn(col);
    let best = MIN_COLUMN_WIDTH;
    column.eachCell({ includeEmpty: false }, (cell) => {
      if (cell.value === null || cell.value === undefined || cell.value === '') return;
      best = Math.max(best, Math.min(String(cell.value).length + 3, MAX_COLUMN_WIDTH));
    });
    column.width = best;
  }
}

// ---------------------------------------------------------------------------
// Sheet 1 — Checklist
// ---------------------------------------------------------------------------

function addChecklistSheet(workbook: Workbook, model: PresentationModel): Worksheet {
  const { checklist } = model;
  const sheet = workbook.addWorksheet(model.sheetNames.checklist, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  writeHeaderRow(sheet, 1, checklist.headers);

  const statusList = `"${checklist.statusOptions.map((o) => o.label).join(',')}"`;
  const priorityList = `"${checklist.priorityOptions.join(',')}"`;
  const messages = checklist.validationMessages;

  checklist.rows.forEach((row, index) => {
    const rowNumber = index + 2;
    const values: (string | null)[] = [
      row.categoryLabel,
      row.name,
      row.requiredLabel,
      row.priority,
      row.receivedDate,
      row.statusLabel,
      row.responsible,
      row.comments,
    ];

    values.forEach((value, i) => {
      const cell = sheet.getCell(rowNumber, i + 1);
      cell.value = value;
      cell.font = BODY_FONT;
      cell.border = THIN_BORDER;
      cell.alignment = { vertical: 'middle', wrapText: i + 1 === COL.name };
    });

    const priorityCell = sheet.getCell(rowNumber, COL.priority);
    priorityCell.fill = priorityFill(row.priority);
    priorityCell.dataValidation = {
      type: 'list',
      allowBlank: true,
      formulae: [priorityList],
      showErrorMessage: true,
      errorTitle: messages.priorityErrorTitle,
      error: messages.priorityError,
    };

    const statusCell = sheet.getCell(rowNumber, COL.status);
    statusCell.fill = statusFill(row.status);
    statusCell.dataValidation = {
      type: 'list',
      allowBlank: true,
      formulae: [statusList],
      showErrorMessage: true,
      errorTitle: messages.statusErrorTitle,
      error: messages.statusError,
    };
  });

  const lastRow = checklist.rows.length + 1;

  if (checklist.rows.length > 0) {
    sheet.addConditionalFormatting({
      ref: `D2:D${lastRow}`,
      rules: checklist.priorityOptions.map(
        (priority, index): ConditionalFormattingRule => ({
          type: 'cellIs',
          operator: 'equal',
          formulae: [`"${priority}"`],
          style: { fill: conditionalFill(PRIORITY_COLORS[priority]) },
          priority: index + 1,
        }),
      ),
    });
    sheet.addConditionalFormatting({
      ref: `F2:F${lastRow}`,
      rules: checklist.statusOptions.map(
        (option, index): ConditionalFormattingRule => ({
          type: 'cellIs',
          operator: 'equal',
          formulae: [`"${option.label}"`],
          style: { fill: conditionalFill(STATUS_COLORS[option.status]) },
          priority: index + 1,
        }),
      ),
    });
  }

  sheet.autoFilter = `A1:${CHECKLIST_LAST_COLUMN}${lastRow}`;

  autoWidth(sheet);
  sheet.getColumn(COL.name).width = NAME_COLUMN_WIDTH;

  return sheet;
}

// ---------------------------------------------------------------------------
// Sheet 2 — Summary
// ---------------------------------------------------------------------------

function addSummarySheet(workbook: Workbook, model: PresentationModel): Worksheet {
  const { summary } = model;
  const sheet = workbook.addWorksheet(model.sheetNames.summary);

  sheet.mergeCells('A1:D1');
  const title = sheet.getCell('A1');
  title.value = summary.title;
  title.font = TITLE_FONT;

  summary.metadata.forEach(({ label, value }, index) => {
    const rowNumber = index + 3;
    sheet.getCell(rowNumber, 1).value = label;
    sheet.getCell(rowNumber, 1).font = BOLD_FONT;
    sheet.getCell(rowNumber, 2).value = value;
    sheet.getCell(rowNumber, 2).font = BODY_FONT;
  });

  // Breakdown by category
  let row = summary.metadata.length + 5;
  writeSubtitle(sheet, row, summary.byCategory.title);
  row += 1;
  writeHeaderRow(sheet, row, summary.byCategory.headers);
  for (const entry of summary.byCategory.rows) {
    row += 1;
    writeBodyCell(sheet, row, 1, entry.label);
    writeBodyCell(sheet, row, 2, entry.count);
  }

  // Breakdown by priority
  row += 2;
  writeSubtitle(sheet, row, summary.byPriority.title);
  row += 1;
  writeHeaderRow(sheet, row, summary.byPriority.headers);
  for (const entry of summary.byPriority.rows) {
    row += 1;
    writeBodyCell(sheet, row, 1, entry.label).fill = priorityFill(entry.value);
    writeBodyCell(sheet, row, 2, entry.count);
  }

  autoWidth(sheet);
  sheet.getColumn(1).width = 30;
  sheet.getColumn(2).width = 18;

  return sheet;
}

// ---------------------------------------------------------------------------
// Sheet 3 — Instructions
// ---------------------------------------------------------------------------

function addInstructionsSheet(workbook: Workbook, model: PresentationModel): Worksheet {
  const { instructions } = model;
  const sheet = workbook.addWorksheet(model.sheetNames.instructions);

  sheet.mergeCells('A1:E1');
  const title = sheet.getCell('A1');
  title.value = instructions.title;
  title.font = TITLE_FONT;

  // How to use
  let row = 3;
  writeSubtitle(sheet, row, instructions.howToUse.title);
  for (const item of instructions.howToUse.items) {
    row += 1;
    sheet.getCell(row, 1).value = item;
    sheet.getCell(row, 1).font = BODY_FONT;
  }

  // Status definitions
  row += 2;
  writeSubtitle(sheet, row, instructions.statusDefinitions.title);
  row += 1;
  writeHeaderRow(sheet, row, instructions.statusDefinitions.headers);
  for (const definition of instructions.statusDefinitions.rows) {
    row += 1;
    writeBodyCell(sheet, row, 1, definition.label, BOLD_FONT).fill = statusFill(definition.status);
    writeBodyCell(sheet, row, 2, definition.definition);
  }

  // Timeline
  row += 2;
  writeSubtitle(sheet, row, instructions.timeline.title);
  row += 1;
  writeHeaderRow(sheet, row, instructions.timeline.headers);
  for (const phase of instructions.timeline.rows) {
    row += 1;
    writeBodyCell(sheet, row, 1, phase.phase, BOLD_FONT);
    writeBodyCell(sheet, row, 2, phase.activities);
  }

  // Contacts template
  row += 2;
  writeSubtitle(sheet, row, instructions.contacts.title);
  row += 1;
  writeHeaderRow(sheet, row, instructions.contacts.headers);
  for (const role of instructions.contacts.roles) {
    row += 1;
    writeBodyCell(sheet, row, 1, role);
    for (let col = 2; col <= instructions.contacts.headers.length; col++) {
      sheet.getCell(row, col).border = THIN_BORDER;
    }
  }

  autoWidth(sheet);
  sheet.getColumn(1).width = 28;
  sheet.getColumn(2).width = 60;

  return sheet;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the in-memory workbook for a presentation model.
 */
export function buildWorkbook(model: PresentationModel): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'DD Checklist Generator';
  workbook.created = new Date(model.generatedAt);

  addChecklistSheet(workbook, model);
  addSummarySheet(workbook, model);
  addInstructionsSheet(workbook, model);

  return workbook;
}

/**
 * Build the workbook and write it to `outputDir/model.fileName`.
 * Creates the directory when missing.
 *
 * @returns Absolute path of the written file
 */
export async function writeWorkbook(model: PresentationModel, outputDir: string): Promise<string> {
  const workbook = buildWorkbook(model);
  const dir = path.resolve(outputDir);
  await mkdir(dir, { recursive: true });

  const filePath = path.join(dir, model.fileName);
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}
