export enum LoggerErrorCode {
    FILE_SINK_UNAVAILABLE = 'logger_file_sink_unavailable',
}
