import type { ChildProcess } from 'child_process';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all */
  error?: Error;
}

/**
 * Resolve once the child is gone: on 'close', or on 'error' when spawning
 * failed. Never rejects.
 */
export function waitForExit(child: ChildProcess): Promise<ProcessExit> {
  return new Promise(resolve => {
    let settled = false;

    child.once('error', (error: Error) => {
      if (settled) return;
      settled = true;
      resolve({ code: null, signal: null, error });
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      resolve({ code, signal });
    });
  });
}
