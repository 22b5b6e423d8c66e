export const ExitCode = {
  Ok: 0,
  Error: 1,
  Invalid: 2,
  UnknownType: 3,
  FileError: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
