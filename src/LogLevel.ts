export enum LogLevel {
    Verbose = 0,
    Debug = 1,
    Log = 2,
    Warn = 3,
    Error = 4,
    Silent = 5
}
