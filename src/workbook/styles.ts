/**
 * Workbook styling constants — fills, fonts, borders.
 */

import type { Borders, Fill, Font } from 'exceljs';
import type { Priority, Status } from '../checklist/types/index.js';

function solidFill(argb: string): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

/** Conditional-format fills take their colour from bgColor */
export function conditionalFill(argb: string): Fill {
  return { type: 'pattern', pattern: 'solid', bgColor: { argb } };
}

export const HEADER_FILL = solidFill('FF1F3864');

export const HEADER_FONT: Partial<Font> = {
  name: 'Calibri',
  bold: true,
  color: { argb: 'FFFFFFFF' },
  size: 11,
};
export const TITLE_FONT: Partial<Font> = { name: 'Calibri', bold: true, size: 14 };
export const SUBTITLE_FONT: Partial<Font> = { name: 'Calibri', bold: true, size: 12 };
export const BODY_FONT: Partial<Font> = { name: 'Calibri', size: 11 };
export const BOLD_FONT: Partial<Font> = { name: 'Calibri', bold: true, size: 11 };

export const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

export const PRIORITY_COLORS: Record<Priority, string> = {
  High: 'FFF4CCCC',
  Medium: 'FFFFF2CC',
  Low: 'FFD9EAD3',
};

export const STATUS_COLORS: Record<Status, string> = {
  Pending: 'FFFCE4D6',
  Received: 'FFDDEBF7',
  Reviewed: 'FFE2EFDA',
  Missing: 'FFF4CCCC',
};

export function priorityFill(priority: Priority): Fill {
  return solidFill(PRIORITY_COLORS[priority]);
}

export function statusFill(status: Status): Fill {
  return solidFill(STATUS_COLORS[status]);
}

/** Column width bounds used by autoWidth() */
export const MIN_COLUMN_WIDTH = 12;
export const MAX_COLUMN_WIDTH = 55;
