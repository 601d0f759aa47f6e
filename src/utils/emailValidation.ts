export type EmailValidationResult = {
  normalized: string;
  isValid: boolean;
  reason: 'empty' | 'invalid_format' | null;
};

export const normalizeEmail = (raw: string): string => {
  // Internal whitespace is never valid in an address and usually comes from copy/paste.
  return String(raw || '')
    .trim()
    .replace(/\s+/g, '')
    .toLowerCase();
};

/**
 * Practical `local@domain.tld` check, not RFC 5322.
 */
export const isValidEmailFormat = (email: string): boolean => {
  const v = normalizeEmail(email);
  if (!v.includes('@')) return false;
  const [local, domain, ...rest] = v.split('@');
  if (rest.length > 0) return false;
  if (!local || !domain) return false;
  if (local.length > 64) return false;
  if (domain.length > 255) return false;
  if (domain.startsWith('.') || domain.endsWith('.')) return false;
  if (!domain.includes('.')) return false;
  if (domain.includes('..')) return false;
  if (!/^[a-z0-9.!#$%&'*+/=?^_`{|}~-]+$/.test(local)) return false;
  if (!/^[a-z0-9.-]+$/.test(domain)) return false;
  const tld = domain.split('.').pop() || '';
  return tld.length >= 2;
};

export const validateEmail = (rawEmail: string): EmailValidationResult => {
  const normalized = normalizeEmail(rawEmail);
  if (!normalized) return { normalized, isValid: false, reason: 'empty' };
  const isValid = isValidEmailFormat(normalized);
  return { normalized, isValid, reason: isValid ? null : 'invalid_format' };
};
