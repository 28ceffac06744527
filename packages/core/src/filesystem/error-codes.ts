/**
 * Path-scope error codes
 */
export enum PathErrorCode {
    EMPTY = 'path_empty',
    INVALID = 'path_invalid',
    NOT_ABSOLUTE = 'path_not_absolute',
    OUTSIDE_ALLOWED_SCOPE = 'path_outside_allowed_scope',
    NOT_A_FILE = 'path_not_a_file',
    NOT_A_DIRECTORY = 'path_not_a_directory',
    PARENT_MISSING = 'path_parent_missing',
    DIRECTORY_NOT_FOUND = 'path_directory_not_found',
    NOT_FOUND = 'path_not_found',
    INACCESSIBLE = 'path_inaccessible',
    INVALID_ROOT = 'path_invalid_root',
}
