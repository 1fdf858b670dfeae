/**
 * Every event or intent the app processes.
 *
 * Actions are plain frozen-shape data: any number of components can observe the same value.
 */
export type Action = Readonly<
  // Lifecycle
  | { type: 'Tick' }
  | { type: 'Render' }
  | { type: 'Resize'; width: number; height: number }
  | { type: 'Suspend' }
  | { type: 'Resume' }
  | { type: 'Quit' }
  | { type: 'ClearScreen' }
  // Notifications
  | { type: 'Error'; message: string }
  | { type: 'Success'; message: string }
  // Extensions
  | { type: 'ViewExtensionDetails'; id: string }
  | { type: 'ImportExtension' }
  | { type: 'CreateNewExtension' }
  | { type: 'EditExtension'; id: string }
  | { type: 'DeleteExtension'; id: string }
  | { type: 'RefreshExtensions' }
  // Profiles
  | { type: 'ViewProfileDetails'; id: string }
  | { type: 'CreateProfile' }
  | { type: 'EditProfile'; id: string }
  | { type: 'DeleteProfile'; id: string }
  | { type: 'RefreshProfiles' }
  | { type: 'LaunchWithProfile'; id: string }
  | { type: 'SetDefaultProfile'; id: string }
  // Navigation
  | { type: 'NavigateToExtensions' }
  | { type: 'NavigateToProfiles' }
  | { type: 'NavigateToSettings' }
  | { type: 'NavigateBack' }
  // Dialog results
  | { type: 'ConfirmDelete' }
  | { type: 'CancelDelete' }
  // Settings
  | { type: 'ChangeTheme'; theme: string }
  | { type: 'UpdateKeybinding'; action: string; keys: readonly string[] }
  | { type: 'ResetKeybindings' }
  | { type: 'SaveSettings' }
>;

export type ActionType = Action['type'];

/**
 * Actions that carry no payload; these are the only ones a keymap entry can name.
 */
export const SIMPLE_ACTION_TYPES = [
  'Tick',
  'Render',
  'Suspend',
  'Resume',
  'Quit',
  'ClearScreen',
  'ImportExtension',
  'CreateNewExtension',
  'RefreshExtensions',
  'CreateProfile',
  'RefreshProfiles',
  'NavigateToExtensions',
  'NavigateToProfiles',
  'NavigateToSettings',
  'NavigateBack',
  'ConfirmDelete',
  'CancelDelete',
  'ResetKeybindings',
  'SaveSettings',
] as const satisfies readonly ActionType[];

export type SimpleActionType = (typeof SIMPLE_ACTION_TYPES)[number];

export function simpleAction(type: SimpleActionType): Action {
  return { type };
}

/** Actions that put a text-entry form in front of the user. */
export function isFormEntryAction(action: Action): boolean {
  return (
    action.type === 'CreateNewExtension' ||
    action.type === 'EditExtension' ||
    action.type === 'CreateProfile' ||
    action.type === 'EditProfile' ||
    action.type === 'ImportExtension'
  );
}

export function isNavigationAction(action: Action): boolean {
  return (
    action.type === 'NavigateBack' ||
    action.type === 'NavigateToExtensions' ||
    action.type === 'NavigateToProfiles' ||
    action.type === 'NavigateToSettings'
  );
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case 'Resize':
      return `Resize(${action.width}, ${action.height})`;
    case 'Error':
    case 'Success':
      return `${action.type}(${JSON.stringify(action.message)})`;
    case 'ViewExtensionDetails':
    case 'EditExtension':
    case 'DeleteExtension':
    case 'ViewProfileDetails':
    case 'EditProfile':
    case 'DeleteProfile':
    case 'LaunchWithProfile':
    case 'SetDefaultProfile':
      return `${action.type}(${action.id})`;
    case 'ChangeTheme':
      return `ChangeTheme(${action.theme})`;
    case 'UpdateKeybinding':
      return `UpdateKeybinding(${action.action}, [${action.keys.join(', ')}])`;
    default:
      return action.type;
  }
}
