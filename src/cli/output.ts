/** Simple output helpers: plain stdout for CLI UX */
import { describeError } from '../shared/utils/error-handling';

let quiet = false;
let jsonMode = false;

export const configureOutput = (opts: { quiet?: boolean; json?: boolean }): void => {
  quiet = !!opts.quiet;
  jsonMode = !!opts.json;
};

export const log = (msg: string): void => {
  if (!quiet) process.stdout.write(`${msg}\n`);
};

export const error = (msg: string): void => {
  process.stderr.write(`${msg}\n`);
};

export const json = (data: unknown): void => {
  if (!quiet) process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
};

export const isJson = (): boolean => jsonMode;

/** Prints a failed command's message and sets a failing exit code */
export const fail = (err: unknown): void => {
  error(describeError(err));
  process.exitCode = 1;
};
