import { Workbook, type Worksheet } from "exceljs";
import { EXCEL_EXTENSIONS } from "../../config";
import type { ContentBlock, TableCell } from "../markdown/types";
import { extractTitle } from "./base";
import type { DocumentParser } from "./types";

function isBlankRow(row: TableCell[]): boolean {
  return row.every((cell) => cell === "" || cell === null || cell === undefined);
}

/**
 * Display text of the used range, row by row. Date cells stay dates so the
 * generator renders them as ISO timestamps. Trailing blank rows are dropped.
 */
export function readSheetRows(worksheet: Worksheet): TableCell[][] {
  const width = worksheet.columnCount;
  const rows: TableCell[][] = [];

  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: TableCell[] = [];
    for (let c = 1; c <= width; c++) {
      const cell = row.getCell(c);
      cells.push(cell.value instanceof Date ? cell.value : cell.text);
    }
    rows.push(cells);
  }

  while (rows.length > 0 && isBlankRow(rows[rows.length - 1])) {
    rows.pop();
  }
  return rows;
}

export const excelParser: DocumentParser = {
  name: "excel",
  extensions: EXCEL_EXTENSIONS,
  async parse(filePath, buffer) {
    const workbook = new Workbook();
    await workbook.xlsx.load(buffer);

    const blocks: ContentBlock[] = [];
    workbook.eachSheet((worksheet) => {
      blocks.push({ type: "heading", level: 2, text: `Sheet: ${worksheet.name}` });
      const rows = readSheetRows(worksheet);
      if (rows.length === 0) {
        blocks.push({ type: "text", text: "(empty sheet)" });
      } else {
        blocks.push({ type: "table", rows });
      }
    });

    return { title: extractTitle(filePath), blocks };
  },
};
