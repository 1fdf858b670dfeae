import { isFormEntryAction, isNavigationAction, type Action } from './action.js';

/**
 * While a create/edit form has focus, printable keys are text, so global chords are not resolved.
 * Entering a form turns the gate on; any navigation turns it off.
 */
export function nextInFormView(current: boolean, action: Action): boolean {
  if (isFormEntryAction(action)) return true;
  if (isNavigationAction(action)) return false;
  return current;
}

/** Global chords resolve only when no text input has focus. */
export function shouldAllowShortcuts(params: { inFormView: boolean; searchActive: boolean }): boolean {
  if (params.inFormView) return false;
  if (params.searchActive) return false;
  return true;
}
