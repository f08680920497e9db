import fs from 'node:fs';
import path from 'node:path';
import { colorize, type Color } from '../utils.js';

/**
 * Everything the run prints, teed to the terminal and the log file.
 */
export type Transcript = {
  filePath: string;
  // Raw child-process output, passed through untouched.
  write: (chunk: string) => void;
  // One message line; colored on the terminal only.
  line: (message: string, color?: Color) => void;
};

export type TranscriptOptions = {
  out?: { write: (chunk: string) => unknown };
  colors?: boolean;
};

/**
 * Open the transcript. The log file is truncated here and only appended to afterwards.
 */
export function createTranscript(filePath: string, opts: TranscriptOptions = {}): Transcript {
  const out: { write: (chunk: string) => unknown } = opts.out ?? process.stdout;
  const useColors = opts.colors ?? (opts.out === undefined && process.stdout.isTTY === true);

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, '', 'utf8');

  const write = (chunk: string): void => {
    fs.appendFileSync(filePath, chunk, 'utf8');
    out.write(chunk);
  };

  return {
    filePath,
    write,
    line: (message, color = 'reset') => {
      fs.appendFileSync(filePath, `${message}\n`, 'utf8');
      out.write(`${useColors ? colorize(message, color) : message}\n`);
    }
  };
}
