/**
 * Tests for the keymap.
 */

import { describe, it, expect } from 'vitest';
import { resolveKeyCommand, IDEOGRAPHIC_SPACE } from './keymap.ts';

describe('resolveKeyCommand', () => {
  it('should map history and select-all shortcuts', () => {
    expect(resolveKeyCommand({ key: 'z', ctrl: true })).toEqual({ type: 'UNDO' });
    expect(resolveKeyCommand({ key: 'y', ctrl: true })).toEqual({ type: 'REDO' });
    expect(resolveKeyCommand({ key: 'a', ctrl: true })).toEqual({ type: 'SELECT_ALL' });
  });

  it('should leave Ctrl+Shift+Z unhandled', () => {
    expect(resolveKeyCommand({ key: 'Z', ctrl: true, shift: true })).toBeNull();
  });

  it('should leave clipboard keys to the host', () => {
    expect(resolveKeyCommand({ key: 'c', text: 'c', ctrl: true })).toBeNull();
    expect(resolveKeyCommand({ key: 'v', text: 'v', ctrl: true })).toBeNull();
  });

  it('should map arrows to visual moves', () => {
    expect(resolveKeyCommand({ key: 'ArrowLeft' })).toEqual({ type: 'MOVE_VISUAL', deltaCol: 1, deltaRow: 0, extend: false });
    expect(resolveKeyCommand({ key: 'ArrowRight', shift: true })).toEqual({
      type: 'MOVE_VISUAL',
      deltaCol: -1,
      deltaRow: 0,
      extend: true,
    });
    expect(resolveKeyCommand({ key: 'ArrowUp' })).toEqual({ type: 'MOVE_VISUAL', deltaCol: 0, deltaRow: -1, extend: false });
    expect(resolveKeyCommand({ key: 'ArrowDown' })).toEqual({ type: 'MOVE_VISUAL', deltaCol: 0, deltaRow: 1, extend: false });
  });

  it('should map editing keys', () => {
    expect(resolveKeyCommand({ key: 'Home', shift: true })).toEqual({ type: 'MOVE_TO_START', extend: true });
    expect(resolveKeyCommand({ key: 'End' })).toEqual({ type: 'MOVE_TO_END', extend: false });
    expect(resolveKeyCommand({ key: 'Enter', text: '\r' })).toEqual({ type: 'INSERT', text: '\n' });
    expect(resolveKeyCommand({ key: 'Backspace' })).toEqual({ type: 'DELETE_BACKWARD' });
    expect(resolveKeyCommand({ key: 'Delete' })).toEqual({ type: 'DELETE_FORWARD' });
    expect(resolveKeyCommand({ key: 'Tab' })).toEqual({ type: 'INSERT', text: IDEOGRAPHIC_SPACE });
  });

  it('should insert plain text only without modifiers', () => {
    expect(resolveKeyCommand({ key: 'あ', text: 'あ' })).toEqual({ type: 'INSERT', text: 'あ' });
    expect(resolveKeyCommand({ key: 'A', text: 'A', shift: true })).toEqual({ type: 'INSERT', text: 'A' });
    expect(resolveKeyCommand({ key: 'q', text: 'q', alt: true })).toBeNull();
    expect(resolveKeyCommand({ key: 'q', text: 'q', meta: true })).toBeNull();
    expect(resolveKeyCommand({ key: 'Shift' })).toBeNull();
  });
});
