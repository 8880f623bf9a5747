export const GREETING_TEXT = 'Hello, this is an AI screening call. Please say something to start the call.';
export const CLOSING_TEXT = 'Thank you for your time. The interview is now complete. Goodbye.';
export const REPROMPT_TEXT = 'You are not audible. Could you please repeat that?';
export const FALLBACK_FOLLOWUP_TEXT = 'Could you please elaborate on that a bit more?';
