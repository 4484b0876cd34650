/** Line and character counts over a UTF-8 file. */
export const FILE_STATS_TASK = 'file_stats';
