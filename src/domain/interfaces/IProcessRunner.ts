/**
 * Output of an external process
 */
export interface ProcessOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Stream the child's output to ours instead of capturing it */
  inheritOutput?: boolean;
}

/**
 * Process runner interface for dependency injection
 */
export interface IProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessOutput>;
  exists(path: string): Promise<boolean>;
}
