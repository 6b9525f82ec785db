import { spawn } from 'child_process';
import * as fs from 'fs';
import { IProcessRunner, ProcessOutput, RunOptions } from '../../domain/interfaces/IProcessRunner';

/**
 * Default process runner over child_process.spawn
 */
export class ChildProcessRunner implements IProcessRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessOutput> {
    return new Promise(resolve => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: options.inheritOutput ? 'inherit' : ['ignore', 'pipe', 'pipe']
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      // spawn failures (binary missing, bad cwd) surface here, not as an exit
      child.on('error', error => {
        resolve({ success: false, code: -1, stdout: '', stderr: error.message });
      });

      child.on('close', code => {
        const exitCode = code ?? -1;
        resolve({
          success: exitCode === 0,
          code: exitCode,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8')
        });
      });
    });
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.promises.access(path, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
