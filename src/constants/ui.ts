// UI and display constants
export const UI_CONSTANTS = {
  EXIT_DELAY_MS: 100,

  SYMBOLS: {
    VALID: '✅',
    INVALID: '❌',
    HINT: '💡',
  },

  SPINNER_MESSAGES: {
    CHECKING_DOMAIN: 'Checking mail exchange records...',
    READING_FILE: 'Reading file...',
  },
} as const;
