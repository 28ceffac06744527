/**
 * FileSystem error codes
 */
export enum FileSystemErrorCode {
    FILE_NOT_FOUND = 'filesystem_file_not_found',
    NOT_TEXT = 'filesystem_not_text',
    NOT_WRITABLE = 'filesystem_not_writable',
    FILE_TOO_LARGE = 'filesystem_file_too_large',
    INVALID_READ_RANGE = 'filesystem_invalid_read_range',
    READ_FAILED = 'filesystem_read_failed',
    WRITE_FAILED = 'filesystem_write_failed',
    GLOB_FAILED = 'filesystem_glob_failed',
    SEARCH_FAILED = 'filesystem_search_failed',
    INVALID_PATTERN = 'filesystem_invalid_pattern',
}

/**
 * Literal text matching error codes
 */
export enum MatchErrorCode {
    NOT_FOUND = 'match_not_found',
    AMBIGUOUS = 'match_ambiguous',
    EMPTY_PATTERN = 'match_empty_pattern',
}
