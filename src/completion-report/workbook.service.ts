import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import {
  CONSOLIDATED_HEADERS,
  CONSOLIDATED_SHEET,
  COURSE_BASE_HEADERS,
  COURSE_TRAILING_HEADERS,
  ENROLLMENTS_SHEET,
  ENROLLMENT_HEADERS,
  MAX_COLUMN_WIDTH,
  MIN_COLUMN_WIDTH,
} from './completion-report.constants';
import {
  CellValue,
  CompletionReportData,
  ReportRow,
} from './interfaces/course-report.interface';
import { sanitizeSheetName, uniqueSheetName } from './utils/sheet-name.util';

@Injectable()
export class WorkbookService {
  /** Libro con: consolidado, una hoja por curso (ya ordenadas) y matrículas */
  build(data: CompletionReportData): XLSX.WorkBook {
    const wb = XLSX.utils.book_new();
    // Los nombres fijos se reservan antes: una hoja de curso nunca los ocupa
    const taken = new Set<string>([CONSOLIDATED_SHEET, ENROLLMENTS_SHEET]);

    XLSX.utils.book_append_sheet(
      wb,
      this.toSheet(CONSOLIDATED_HEADERS, data.consolidatedRows),
      CONSOLIDATED_SHEET,
    );

    for (const sheet of data.courseSheets) {
      const headers = [...COURSE_BASE_HEADERS, ...sheet.activityColumns, ...COURSE_TRAILING_HEADERS];
      const sheetName = uniqueSheetName(sanitizeSheetName(sheet.shortname), taken);
      taken.add(sheetName);
      XLSX.utils.book_append_sheet(wb, this.toSheet(headers, sheet.rows), sheetName);
    }

    XLSX.utils.book_append_sheet(
      wb,
      this.toSheet(ENROLLMENT_HEADERS, data.enrollmentRows),
      ENROLLMENTS_SHEET,
    );

    return wb;
  }

  write(wb: XLSX.WorkBook, filePath: string): void {
    XLSX.writeFile(wb, filePath, { bookType: 'xlsx' });
  }

  toSheet(headers: readonly string[], rows: ReportRow[]): XLSX.WorkSheet {
    const aoa: CellValue[][] = [
      [...headers],
      ...rows.map((r) => headers.map((h) => r[h] ?? '')),
    ];
    const ws = XLSX.utils.aoa_to_sheet(aoa);
    ws['!cols'] = columnWidths(aoa).map((wch) => ({ wch }));
    return ws;
  }
}

/** Ancho por columna = valor más largo + 2, acotado a [12, 60] */
export function columnWidths(aoa: CellValue[][]): number[] {
  const columns = aoa.reduce((n, row) => Math.max(n, row.length), 0);
  const widths: number[] = [];
  for (let c = 0; c < columns; c++) {
    let maxLen = 0;
    for (const row of aoa) {
      const val = row[c];
      if (val === undefined) continue;
      maxLen = Math.max(maxLen, String(val).length);
    }
    widths.push(Math.min(Math.max(MIN_COLUMN_WIDTH, maxLen + 2), MAX_COLUMN_WIDTH));
  }
  return widths;
}
