const MAX_INPUT_LENGTH = 200;

/** Strips markup characters, script-like schemes and control characters from chat input. */
function sanitizeInput(input?: string | null, maxLength: number = MAX_INPUT_LENGTH): string {
  if (!input) return '';

  let sanitized = input
    .replace(/[<>"'&]/g, '')
    .replace(/javascript:/gi, '')
    .replace(/data:/gi, '')
    .replace(/vbscript:/gi, '')
    .trim();

  sanitized = sanitized
    .split('')
    .filter((char) => {
      const code = char.charCodeAt(0);
      return code >= 32 && code !== 127 && (code < 128 || code > 159);
    })
    .join('');

  return sanitized.substring(0, maxLength);
}

export { sanitizeInput };
