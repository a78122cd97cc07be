export type SheetGrid = string[][];

export type AliasTable = {
  columns: string[];
  rows: string[][];
};

export type CellValue = string | number;

export interface SheetStore {
  readSheet(name: string): Promise<SheetGrid>;
  readAliasTable(): Promise<AliasTable>;
  writeCell(sheetName: string, row: number, col: number, value: CellValue): Promise<void>;
}

export const HEADER_ROW_INDEX = 1;
export const FIRST_DATA_ROW_INDEX = 2;
