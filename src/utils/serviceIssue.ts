const summarize = (err: unknown): string => {
  if (!err) return '';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return `${err.message} ${readErrorCode(err) ?? ''}`;
  try {
    return JSON.stringify(err);
  } catch (e) {
    return String(err);
  }
};

export const readErrorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

export const readErrorMessage = (err: unknown): string | undefined => {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err) {
    const { message } = err;
    if (typeof message === 'string' && message) return message;
  }
  return undefined;
};

/**
 * Heuristic classifier for "service down" situations:
 * the request left the device but the backend or the network failed.
 */
export const isLikelyServiceDownError = (err: unknown): boolean => {
  const msg = summarize(err).toLowerCase();
  if (!msg) return false;

  return (
    msg.includes('auth/network-request-failed') ||
    msg.includes('unavailable') ||
    msg.includes('deadline-exceeded') ||
    msg.includes('bad gateway') ||
    msg.includes('502') ||
    msg.includes('503') ||
    msg.includes('504') ||
    msg.includes('timeout') ||
    msg.includes('timed out') ||
    msg.includes('network request failed') ||
    msg.includes('econnreset') ||
    msg.includes('econnrefused') ||
    msg.includes('enotfound')
  );
};
