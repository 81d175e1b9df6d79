export enum LogLevel {
  LOG,
  INFO,
  WARN,
  ERROR,
}

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  USAGE = 2,
}
