export type { ConfirmationPolicy, ConsoleConfirmationOptions } from './policy.js';
export { createConsoleConfirmation, fixedConfirmation, isDeclined } from './policy.js';
