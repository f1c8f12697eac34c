import { spawn } from 'node:child_process';

export type OpenPath = (notePath: string) => Promise<void>;

/**
 * Opens notes in `editor` when configured, otherwise writes the path so the
 * caller's shell can pick it up.
 */
export function createOpener(options: {
  editor?: string;
  stdout: { write(chunk: string): unknown };
}): OpenPath {
  const { editor, stdout } = options;
  if (!editor) {
    return async (notePath) => {
      stdout.write(`${notePath}\n`);
    };
  }

  const [command = editor, ...editorArgs] = editor.split(/\s+/).filter(Boolean);

  return (notePath) =>
    new Promise<void>((resolve, reject) => {
      const child = spawn(command, [...editorArgs, notePath], { stdio: 'inherit' });
      child.on('error', reject);
      child.on('exit', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${editor} exited with code ${code ?? 'unknown'}`));
        }
      });
    });
}
