const LETTER_OR_DIGIT = /[\p{L}\p{Nd}]/u;
const SEPARATOR = /[\s_-]/u;

/**
 * Derives a stable automation id from a human label:
 * "Turn On Living Room Lights" -> "turn_on_living_room_lights".
 */
export function generateAutomationId(label: string): string {
  let result = '';
  for (const char of label) {
    if (LETTER_OR_DIGIT.test(char)) {
      // Some letters lower-case to several code points; keep only the letters.
      for (const lower of char.toLowerCase()) {
        if (LETTER_OR_DIGIT.test(lower)) {
          result += lower;
        }
      }
    } else if (SEPARATOR.test(char) && result.length > 0 && !result.endsWith('_')) {
      result += '_';
    }
  }
  return result.endsWith('_') ? result.slice(0, -1) : result;
}
