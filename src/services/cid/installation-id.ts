const INSTALLATION_ID_PATTERN = /^\d{63}$/;

/**
 * Keep only the digits of a pasted Installation ID, whatever separators
 * the activation dialog or the chat client added.
 * Returns null unless the result is 63 digits not starting with "000".
 */
export const normalizeInstallationId = (raw: string): string | null => {
  const digits = raw.replace(/\D/g, '');
  if (!INSTALLATION_ID_PATTERN.test(digits) || digits.startsWith('000')) {
    return null;
  }
  return digits;
};
