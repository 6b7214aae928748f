/**
 * Message body input for `send`: literal text, or @path to read a file.
 */

import * as fs from 'fs';
import * as path from 'path';

export function readMessageBody(bodyOrFile: string, cwd: string = process.cwd()): string {
  if (bodyOrFile.startsWith('@')) {
    const filePath = bodyOrFile.slice(1);
    const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(cwd, filePath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(`File not found: ${absolutePath}`);
    }

    return fs.readFileSync(absolutePath, 'utf8');
  }

  // Shell-quoted bodies can't easily carry newlines
  return bodyOrFile.replace(/\\n/g, '\n');
}
