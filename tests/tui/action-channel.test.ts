import { describe, it, expect } from 'vitest';
import { ActionChannel } from '../../src/tui/action-channel.js';
import { describeAction, isFormEntryAction, isNavigationAction, simpleAction } from '../../src/tui/action.js';

describe('ActionChannel', () => {
  it('delivers actions in send order', () => {
    const channel = new ActionChannel();
    channel.send({ type: 'Tick' });
    channel.send({ type: 'Render' });
    expect(channel.size).toBe(2);
    expect(channel.drain()).toEqual([{ type: 'Tick' }, { type: 'Render' }]);
    expect(channel.size).toBe(0);
  });

  it('drains only what was queued at the time of the call', () => {
    const channel = new ActionChannel();
    channel.send({ type: 'Tick' });
    const batch = channel.drain();
    channel.send({ type: 'Render' });
    expect(batch).toEqual([{ type: 'Tick' }]);
    expect(channel.drain()).toEqual([{ type: 'Render' }]);
  });

  it('ignores sends after close', () => {
    const channel = new ActionChannel();
    channel.send({ type: 'Tick' });
    channel.close();
    channel.send({ type: 'Quit' });
    expect(channel.isClosed).toBe(true);
    expect(channel.size).toBe(0);
  });
});

describe('action helpers', () => {
  it('classifies form-entry and navigation actions', () => {
    expect(isFormEntryAction({ type: 'EditProfile', id: 'p' })).toBe(true);
    expect(isFormEntryAction({ type: 'ImportExtension' })).toBe(true);
    expect(isFormEntryAction({ type: 'ViewProfileDetails', id: 'p' })).toBe(false);
    expect(isNavigationAction(simpleAction('NavigateBack'))).toBe(true);
    expect(isNavigationAction(simpleAction('Render'))).toBe(false);
  });

  it('describes payloads', () => {
    expect(describeAction({ type: 'Resize', width: 80, height: 24 })).toBe('Resize(80, 24)');
    expect(describeAction({ type: 'Error', message: 'boom' })).toBe('Error("boom")');
    expect(describeAction({ type: 'EditExtension', id: 'ext' })).toBe('EditExtension(ext)');
    expect(describeAction({ type: 'UpdateKeybinding', action: 'up', keys: ['k', 'Up'] })).toBe(
      'UpdateKeybinding(up, [k, Up])'
    );
    expect(describeAction({ type: 'Quit' })).toBe('Quit');
  });
});
