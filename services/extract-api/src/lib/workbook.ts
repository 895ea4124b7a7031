/**
 * XLSX Report Rendering
 *
 * Lays a FinancialRecord out on a single "Financial Data" sheet.
 */

import ExcelJS from 'exceljs';
import { LINE_ITEM_KEYS, LINE_ITEM_LABELS, type FinancialRecord } from '@finsheet/shared';

export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const SHEET_NAME = 'Financial Data';
export const HEADER_ROW = 5;
export const FIRST_ITEM_ROW = HEADER_ROW + 1;
export const NOTES_HEADING_ROW = FIRST_ITEM_ROW + LINE_ITEM_KEYS.length + 2;

const VALUE_FORMAT = '#,##0.00';
const MISSING_VALUE = 'N/A';

const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

const HEADER_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FF1F4E78' },
};

const MISSING_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFFFC7CE' },
};

/**
 * Download name: spaces in the company name become underscores.
 */
export function workbookFilename(companyName: string): string {
  return `financial_extract_${companyName.replace(/ /g, '_')}.xlsx`;
}

export function buildWorkbook(record: FinancialRecord): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  // Title block
  const title = sheet.getCell('A1');
  title.value = `Financial Statement - ${record.company_name}`;
  title.font = { bold: true, size: 14 };
  sheet.mergeCells('A1:E1');

  sheet.getCell('A2').value = `Currency: ${record.currency}`;
  sheet.getCell('A3').value = `Units: ${record.units}`;

  // Header row
  const headers = ['Line Item', ...record.fiscal_years.map((year) => `FY ${year}`)];
  const headerRow = sheet.getRow(HEADER_ROW);
  headers.forEach((header, index) => {
    const cell = headerRow.getCell(index + 1);
    cell.value = header;
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 12 };
    cell.fill = HEADER_FILL;
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = THIN_BORDER;
  });

  // Line items, always all of them in vocabulary order
  LINE_ITEM_KEYS.forEach((key, index) => {
    const row = sheet.getRow(FIRST_ITEM_ROW + index);

    const label = row.getCell(1);
    label.value = LINE_ITEM_LABELS[key];
    label.font = { bold: true };
    label.border = THIN_BORDER;

    const values = record.financial_data[key];
    record.fiscal_years.forEach((year, yearIndex) => {
      const cell = row.getCell(yearIndex + 2);
      const value = values?.[year];

      if (value === undefined) {
        cell.value = MISSING_VALUE;
        cell.font = { italic: true, color: { argb: 'FF9C0006' } };
        cell.fill = MISSING_FILL;
      } else {
        cell.value = value;
        cell.numFmt = VALUE_FORMAT;
      }
      cell.alignment = { horizontal: 'right' };
      cell.border = THIN_BORDER;
    });
  });

  // Notes
  const notesHeading = sheet.getCell(NOTES_HEADING_ROW, 1);
  notesHeading.value = 'Notes & Assumptions:';
  notesHeading.font = { bold: true, size: 11 };

  record.notes.forEach((note, index) => {
    const rowNumber = NOTES_HEADING_ROW + 1 + index;
    sheet.getCell(rowNumber, 1).value = `• ${note}`;
    sheet.mergeCells(rowNumber, 1, rowNumber, 5);
  });

  sheet.getColumn(1).width = 25;
  record.fiscal_years.forEach((_year, index) => {
    sheet.getColumn(index + 2).width = 18;
  });

  return workbook;
}

/**
 * Render the record as XLSX bytes.
 */
export async function renderWorkbook(record: FinancialRecord): Promise<Buffer> {
  const workbook = buildWorkbook(record);
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}
