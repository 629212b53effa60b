export const QUERIES = {
  TEST_CONNECTION: 'SELECT 1',
  BEGIN: 'BEGIN',
  COMMIT: 'COMMIT',
  ROLLBACK: 'ROLLBACK',
};
