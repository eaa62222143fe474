export { buildWorkbook, writeWorkbook, autoWidth } from './render-workbook.js';
