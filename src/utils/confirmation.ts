/**
 * Result returned instead of blocking on a prompt. The caller decides how
 * to confirm (ask on a TTY, honour --yes, or stop) and calls back with
 * consent.
 */
export interface ConfirmationRequired {
  kind: 'confirmation_required';

  /** Question to put to the operator */
  message: string;
}

export function confirmationRequired(message: string): ConfirmationRequired {
  return { kind: 'confirmation_required', message };
}
