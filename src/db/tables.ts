export const tables = {
  level2: 'tbl_level2',
  level2Audit: 'tbl_level2_audit'
};
