export { ColumnSchema } from "./schema";
export { compareRows, isRow, type Row, type RowFields, type RowIndex } from "./types";
