import { spawn } from 'node:child_process';

export interface ShellResult {
  exitCode: number | null;
  output: string;
  errorOutput: string;
  timedOut: boolean;
}

export type RunCommandFn = (commandName: string, args: string[], timeoutMs: number) => Promise<ShellResult>;

export async function runCommand(commandName: string, args: string[], timeoutMs: number): Promise<ShellResult> {
  return new Promise((resolve) => {
    const child = spawn(commandName, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env
    });

    let output = '';
    let errorOutput = '';
    let timedOut = false;

    child.stdout.on('data', (chunk) => {
      output += String(chunk);
    });

    child.stderr.on('data', (chunk) => {
      errorOutput += String(chunk);
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      setTimeout(() => child.kill('SIGKILL'), 1500).unref();
    }, timeoutMs);

    child.on('close', (exitCode) => {
      clearTimeout(timeout);
      resolve({
        exitCode,
        output,
        errorOutput,
        timedOut
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeout);
      resolve({
        exitCode: null,
        output,
        errorOutput: `${errorOutput}\n${error.message}`.trim(),
        timedOut
      });
    });
  });
}

export function describeShellFailure(commandName: string, result: ShellResult): string {
  if (result.timedOut) {
    return `${commandName} excedeu o tempo limite.`;
  }

  const detail = result.errorOutput.trim() || result.output.trim();
  const code = result.exitCode === null ? 'sem codigo de saida' : `codigo ${result.exitCode}`;
  return detail ? `${commandName} falhou (${code}): ${detail}` : `${commandName} falhou (${code}).`;
}
