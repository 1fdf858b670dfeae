export const VIEW_TYPES = [
  'ExtensionList',
  'ExtensionDetail',
  'ExtensionCreate',
  'ExtensionEdit',
  'ExtensionImport',
  'ProfileList',
  'ProfileDetail',
  'ProfileCreate',
  'ProfileEdit',
  'ConfirmDelete',
  'Settings',
] as const;

export type ViewType = (typeof VIEW_TYPES)[number];
