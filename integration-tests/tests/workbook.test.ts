/**
 * XLSX Report Tests
 */

import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import type { FinancialRecord } from '@finsheet/shared';
import {
  buildWorkbook,
  renderWorkbook,
  workbookFilename,
  SHEET_NAME,
} from '../../services/extract-api/src/lib/workbook';

const RECORD: FinancialRecord = {
  company_name: 'ACME INDUSTRIES',
  fiscal_years: ['2024', '2023'],
  financial_data: {
    revenue: { '2024': 100 },
    net_income: { '2024': 12.5, '2023': -3 },
  },
  currency: 'USD',
  units: 'Actual',
  notes: ['Data extracted using pattern matching', 'Manual review recommended for accuracy'],
};

function sheetOf(record: FinancialRecord): ExcelJS.Worksheet {
  const sheet = buildWorkbook(record).getWorksheet(SHEET_NAME);
  if (!sheet) throw new Error(`missing sheet ${SHEET_NAME}`);
  return sheet;
}

describe('XLSX report', () => {
  it('should write the title block', () => {
    const sheet = sheetOf(RECORD);

    expect(sheet.getCell('A1').value).toBe('Financial Statement - ACME INDUSTRIES');
    expect(sheet.getCell('A1').font).toMatchObject({ bold: true, size: 14 });
    expect(sheet.getCell('A1').isMerged).toBe(true);
    expect(sheet.getCell('A2').value).toBe('Currency: USD');
    expect(sheet.getCell('A3').value).toBe('Units: Actual');
  });

  it('should write one header column per fiscal year', () => {
    const sheet = sheetOf(RECORD);

    expect(sheet.getCell('A5').value).toBe('Line Item');
    expect(sheet.getCell('B5').value).toBe('FY 2024');
    expect(sheet.getCell('C5').value).toBe('FY 2023');
    expect(sheet.getCell('D5').value).toBeNull();
    expect(sheet.getCell('B5').font).toMatchObject({ bold: true, size: 12, color: { argb: 'FFFFFFFF' } });
    expect(sheet.getCell('B5').fill).toMatchObject({ fgColor: { argb: 'FF1F4E78' } });
  });

  it('should write values with a number format and mark missing ones', () => {
    const sheet = sheetOf(RECORD);

    expect(sheet.getCell('A6').value).toBe('Revenue');
    expect(sheet.getCell('B6').value).toBe(100);
    expect(sheet.getCell('B6').numFmt).toBe('#,##0.00');
    expect(sheet.getCell('C6').value).toBe('N/A');
    expect(sheet.getCell('C6').font).toMatchObject({ italic: true, color: { argb: 'FF9C0006' } });
    expect(sheet.getCell('C6').fill).toMatchObject({ fgColor: { argb: 'FFFFC7CE' } });
  });

  it('should list every line item in vocabulary order', () => {
    const sheet = sheetOf(RECORD);
    const labels: ExcelJS.CellValue[] = [];
    for (let row = 6; row <= 16; row++) {
      labels.push(sheet.getCell(row, 1).value);
    }

    expect(labels).toEqual([
      'Revenue',
      'Cost of Revenue',
      'Gross Profit',
      'Operating Expenses',
      'Operating Income',
      'Interest Expense',
      'Tax Expense',
      'Net Income',
      'Total Assets',
      'Total Liabilities',
      "Shareholders' Equity",
    ]);
    expect(sheet.getCell('B13').value).toBe(12.5);
    expect(sheet.getCell('C13').value).toBe(-3);
  });

  it('should write the notes below the line items', () => {
    const sheet = sheetOf(RECORD);

    expect(sheet.getCell('A19').value).toBe('Notes & Assumptions:');
    expect(sheet.getCell('A20').value).toBe('• Data extracted using pattern matching');
    expect(sheet.getCell('A21').value).toBe('• Manual review recommended for accuracy');
    expect(sheet.getCell('E20').isMerged).toBe(true);
  });

  it('should write only the notes heading when there are no notes', () => {
    const sheet = sheetOf({ ...RECORD, notes: [] });

    expect(sheet.getCell('A19').value).toBe('Notes & Assumptions:');
    expect(sheet.getCell('A20').value).toBeNull();
  });

  it('should size the label and year columns', () => {
    const sheet = sheetOf(RECORD);

    expect(sheet.getColumn(1).width).toBe(25);
    expect(sheet.getColumn(2).width).toBe(18);
    expect(sheet.getColumn(3).width).toBe(18);
  });

  it('should render bytes that load back as a workbook', async () => {
    const content = await renderWorkbook(RECORD);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from([content]));

    const sheet = workbook.getWorksheet(SHEET_NAME);
    expect(sheet?.getCell('B6').value).toBe(100);
    expect(sheet?.getCell('C6').value).toBe('N/A');
  });

  it('should name the download after the company', () => {
    expect(workbookFilename('ACME INDUSTRIES')).toBe('financial_extract_ACME_INDUSTRIES.xlsx');
    expect(workbookFilename('Unknown')).toBe('financial_extract_Unknown.xlsx');
  });
});
