import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { Storage } from '../../src/storage/storage.js';
import { ActionChannel } from '../../src/tui/action-channel.js';
import type { Action } from '../../src/tui/action.js';
import { Frame } from '../../src/tui/frame.js';
import { key, type KeyEvent } from '../../src/tui/key-utils.js';
import { themeByName } from '../../src/tui/theme.js';
import { ViewManager, wrapText } from '../../src/tui/view-manager.js';
import { makeExtension, makeProfile, makeTempDir } from '../fixtures.js';

let tempDir: string;
let storage: Storage;
let channel: ActionChannel;
let clock: number;
let vm: ViewManager;

function keyEvent(k: KeyEvent): { type: 'Key'; key: KeyEvent } {
  return { type: 'Key', key: k };
}

/** Apply one action the way a single drain pass would. */
function dispatch(action: Action): Action | null {
  return vm.update(action);
}

beforeEach(() => {
  tempDir = makeTempDir('views');
  storage = new Storage(tempDir);
  storage.init();
  storage.saveExtension(makeExtension('alpha', { name: 'Alpha' }));
  channel = new ActionChannel();
  clock = 1_000;
  vm = new ViewManager(storage, { now: () => clock });
  vm.registerActionHandler(channel);
  vm.init({ width: 80, height: 24 });
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('ViewManager navigation', () => {
  it('starts on the extension list', () => {
    expect(vm.currentView).toBe('ExtensionList');
    expect(vm.previousView).toBeNull();
    expect(vm.tabBar.activeTab).toBe('Extensions');
  });

  it('returns to the detail view after editing from it', () => {
    dispatch({ type: 'ViewExtensionDetails', id: 'alpha' });
    dispatch({ type: 'EditExtension', id: 'alpha' });
    expect(vm.currentView).toBe('ExtensionEdit');
    expect(vm.cameFromDetailView).toBe(true);
    expect(vm.editingExtensionId).toBe('alpha');

    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ExtensionDetail');
    expect(vm.editingExtensionId).toBeNull();
    expect(vm.cameFromDetailView).toBe(false);
  });

  it('returns to the list after editing from it', () => {
    dispatch({ type: 'EditExtension', id: 'alpha' });
    expect(vm.cameFromDetailView).toBe(false);
    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ExtensionList');
  });

  it('applies the same rule to profiles', () => {
    storage.saveProfile(makeProfile('work'));
    dispatch({ type: 'NavigateToProfiles' });
    dispatch({ type: 'ViewProfileDetails', id: 'work' });
    dispatch({ type: 'EditProfile', id: 'work' });
    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ProfileDetail');
    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ProfileList');
  });

  it('goes from a tab switch into a create form and back', () => {
    dispatch({ type: 'NavigateToProfiles' });
    expect(vm.currentView).toBe('ProfileList');
    expect(vm.tabBar.activeTab).toBe('Profiles');

    dispatch({ type: 'CreateProfile' });
    expect(vm.currentView).toBe('ProfileCreate');
    expect(vm.previousView).toBe('ProfileList');

    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ProfileList');
    expect(vm.previousView).toBe('ProfileCreate');
  });

  it('clears edit state when switching tabs', () => {
    dispatch({ type: 'ViewExtensionDetails', id: 'alpha' });
    dispatch({ type: 'EditExtension', id: 'alpha' });
    dispatch({ type: 'NavigateToSettings' });
    expect(vm.currentView).toBe('Settings');
    expect(vm.editingExtensionId).toBeNull();
    expect(vm.cameFromDetailView).toBe(false);
  });

  it('ignores navigation to the current view', () => {
    dispatch({ type: 'NavigateToProfiles' });
    dispatch({ type: 'NavigateToProfiles' });
    expect(vm.previousView).toBe('ExtensionList');
  });

  it('goes back from import to the previous view', () => {
    dispatch({ type: 'ImportExtension' });
    expect(vm.currentView).toBe('ExtensionImport');
    dispatch({ type: 'NavigateBack' });
    expect(vm.currentView).toBe('ExtensionList');
  });

  it('reports a missing record instead of navigating', () => {
    expect(dispatch({ type: 'ViewExtensionDetails', id: 'ghost' })).toEqual({
      type: 'Error',
      message: 'Extension not found: ghost',
    });
    expect(vm.currentView).toBe('ExtensionList');
  });

  it('routes keys to the active view', () => {
    expect(vm.handleEvents(keyEvent(key('n')))).toEqual({ type: 'CreateNewExtension' });
    expect(vm.handleEvents(keyEvent(key('Enter')))).toEqual({ type: 'ViewExtensionDetails', id: 'alpha' });
    expect(vm.handleEvents(keyEvent(key('2')))).toEqual({ type: 'NavigateToProfiles' });
    expect(vm.handleEvents(null)).toBeNull();
  });
});

describe('ViewManager delete flow', () => {
  it('refuses to delete an extension a profile uses', () => {
    storage.saveProfile(makeProfile('dev', { name: 'Dev', extensionIds: ['alpha'] }));
    expect(dispatch({ type: 'DeleteExtension', id: 'alpha' })).toEqual({
      type: 'Error',
      message: 'Cannot delete extension "alpha": it is used by profile(s): Dev',
    });
    expect(vm.currentView).toBe('ExtensionList');
    expect(vm.deletingExtensionId).toBeNull();
    expect(storage.listExtensions()).toHaveLength(1);
  });

  it('deletes after confirmation and returns to the list', () => {
    dispatch({ type: 'DeleteExtension', id: 'alpha' });
    expect(vm.currentView).toBe('ConfirmDelete');
    expect(vm.previousView).toBe('ExtensionList');
    expect(vm.deletingExtensionId).toBe('alpha');

    expect(dispatch({ type: 'ConfirmDelete' })).toEqual({ type: 'Render' });
    expect(storage.listExtensions()).toEqual([]);
    expect(vm.currentView).toBe('ExtensionList');
    expect(vm.previousView).toBeNull();
    expect(vm.deletingExtensionId).toBeNull();
    expect(channel.drain()).toContainEqual({ type: 'RefreshExtensions' });
  });

  it('leaves a deleted record detail view for its list', () => {
    storage.saveProfile(makeProfile('work'));
    dispatch({ type: 'NavigateToProfiles' });
    dispatch({ type: 'ViewProfileDetails', id: 'work' });
    dispatch({ type: 'DeleteProfile', id: 'work' });
    expect(vm.previousView).toBe('ProfileDetail');

    dispatch({ type: 'ConfirmDelete' });
    expect(vm.currentView).toBe('ProfileList');
    expect(storage.listProfiles()).toEqual([]);
    expect(channel.drain()).toContainEqual({ type: 'RefreshProfiles' });
  });

  it('does nothing on ConfirmDelete without a pending id', () => {
    expect(dispatch({ type: 'ConfirmDelete' })).toBeNull();
    expect(storage.listExtensions()).toHaveLength(1);
    expect(vm.currentView).toBe('ExtensionList');
  });

  it('cancels back to the covered view', () => {
    dispatch({ type: 'ViewExtensionDetails', id: 'alpha' });
    dispatch({ type: 'DeleteExtension', id: 'alpha' });
    expect(vm.tabBar.activeTab).toBe('Extensions');

    dispatch({ type: 'CancelDelete' });
    expect(vm.currentView).toBe('ExtensionDetail');
    expect(vm.deletingExtensionId).toBeNull();
    expect(storage.listExtensions()).toHaveLength(1);
  });

  it('answers dialog keys with confirm or cancel actions', () => {
    dispatch({ type: 'DeleteExtension', id: 'alpha' });
    expect(vm.handleEvents(keyEvent(key('Enter')))).toEqual({ type: 'CancelDelete' });
    expect(vm.handleEvents(keyEvent(key('Left')))).toBeNull();
    expect(vm.handleEvents(keyEvent(key('Enter')))).toEqual({ type: 'ConfirmDelete' });
    expect(vm.handleEvents(keyEvent(key('Y', { shift: true })))).toEqual({ type: 'ConfirmDelete' });
  });
});

describe('ViewManager messages', () => {
  it('keeps the error overlay for its full duration', () => {
    dispatch({ type: 'Error', message: 'boom' });
    expect(vm.errorOverlay?.message).toBe('boom');

    clock += 5_000;
    dispatch({ type: 'Tick' });
    expect(vm.errorOverlay).not.toBeNull();

    clock += 1;
    dispatch({ type: 'Tick' });
    expect(vm.errorOverlay).toBeNull();
  });

  it('swallows keys while the overlay is up and dismisses it on Esc', () => {
    dispatch({ type: 'Error', message: 'boom' });
    expect(vm.handleEvents(keyEvent(key('n')))).toBeNull();
    expect(vm.errorOverlay).not.toBeNull();
    expect(vm.handleEvents(keyEvent(key('Esc')))).toBeNull();
    expect(vm.errorOverlay).toBeNull();
    expect(vm.handleEvents(keyEvent(key('n')))).toEqual({ type: 'CreateNewExtension' });
  });

  it('expires success notices on their own timer', () => {
    dispatch({ type: 'Success', message: 'Saved' });
    clock += 3_001;
    dispatch({ type: 'Tick' });
    expect(vm.notice).toBeNull();
  });

  it('marks a default profile and asks the list to refresh', () => {
    storage.saveProfile(makeProfile('work', { name: 'Work', metadata: { ...makeProfile('work').metadata, icon: '💼' } }));
    expect(dispatch({ type: 'SetDefaultProfile', id: 'work' })).toEqual({
      type: 'Success',
      message: 'Default profile: 💼 Work',
    });
    expect(storage.getDefaultProfile()?.id).toBe('work');
    expect(channel.drain()).toContainEqual({ type: 'RefreshProfiles' });
  });
});

describe('ViewManager drawing', () => {
  it('draws the tab bar, the dialog over its view and the overlay', () => {
    dispatch({ type: 'DeleteExtension', id: 'alpha' });
    dispatch({ type: 'Error', message: 'disk full' });
    const frame = new Frame(80, 24, themeByName('mocha'));
    vm.draw(frame, frame.area);
    const text = frame.lines().join('\n');
    expect(frame.rowText(1)).toContain('1 Extensions');
    expect(text).toContain('Delete extension');
    expect(text).toContain('disk full');
    expect(text).toContain('Esc to dismiss');
  });
});

describe('wrapText', () => {
  it('wraps on word boundaries and splits long words', () => {
    expect(wrapText('one two three', 7)).toEqual(['one two', 'three']);
    expect(wrapText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    expect(wrapText('a\nb', 10)).toEqual(['a', 'b']);
    expect(wrapText('x', 0)).toEqual([]);
  });
});

describe('ViewManager storage side effects', () => {
  it('keeps files on disk untouched by navigation', () => {
    dispatch({ type: 'NavigateToProfiles' });
    dispatch({ type: 'NavigateBack' });
    expect(fs.readdirSync(path.join(tempDir, 'extensions'))).toEqual(['alpha.json']);
  });
});
