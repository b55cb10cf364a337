import { execFile } from 'child_process';
import { promisify } from 'util';

export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], { encoding: 'utf-8' });
  return stdout;
};
