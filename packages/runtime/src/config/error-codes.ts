export enum ConfigErrorCode {
    NOT_FOUND = 'config_file_not_found',
    UNREADABLE = 'config_file_read_error',
    INVALID_YAML = 'config_parse_error',
    SCRATCH_ROOT_UNAVAILABLE = 'config_scratch_root_unavailable',
}
