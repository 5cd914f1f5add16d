export interface LinkedAbort {
  controller: AbortController;
  /** Detaches from the parent signal. */
  dispose(): void;
}

/**
 * Controller that aborts when any parent aborts, but can also be aborted on
 * its own without touching the parents.
 */
export function linkedAbortController(...parents: Array<AbortSignal | undefined>): LinkedAbort {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const detach of detachers) {
        detach();
      }
    },
  };
}
