import { CollaboratorTimeoutError } from "./errors";

/**
 * Runs a collaborator call under a deadline.
 *
 * The call receives an AbortSignal that fires when `ms` elapses; the
 * returned promise then rejects with CollaboratorTimeoutError. The timer is
 * cleared on every path.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  stage: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(stage, ms));
    }, ms);
  });
  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
