import { CellValue } from '../types/ddl-architect.types';

export const MEMBER_KPI_ROWS: CellValue[][] = [
  ['Alice', 'Moreno', 'Sales Revenue', '95000.00', '2024-03-28'],
  ['Omar', 'Haddad', 'Sales Revenue', '88000.00', '2024-03-28'],
];

export const TEAM_MEMBER_ROWS: CellValue[][] = [
  [101, 'Alice Moreno', 'Sales Team A'],
  [102, 'Omar Haddad', 'Sales Team A'],
];

export const GENERIC_ROWS: CellValue[][] = [
  ['Sample_Value_A', 123],
  ['Sample_Value_B', 456],
];

export const FALLBACK_COLUMNS = ['col_1', 'col_2', 'col_3'];
