/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  defaultKeyBindings,
  keyMatches,
  resolveKeyAction,
  type KeyBindingConfig,
  type KeyEvent,
} from './keyBindings.js';

const press = (name: string, ctrl = false): KeyEvent => ({
  name,
  ctrl,
  kind: 'press',
});

describe('keyBindings config', () => {
  it('binds every navigation action', () => {
    for (const bindings of Object.values(defaultKeyBindings)) {
      expect(bindings.length).toBeGreaterThan(0);
    }
  });

  it('never binds the same key to two actions', () => {
    const seen = new Map<string, string>();
    for (const [action, bindings] of Object.entries(defaultKeyBindings)) {
      for (const binding of bindings) {
        const id = `${binding.key}:${binding.ctrl ?? 'any'}`;
        expect(seen.get(id)).toBeUndefined();
        seen.set(id, action);
      }
    }
  });
});

describe('keyMatches', () => {
  it('ignores ctrl when the binding does not constrain it', () => {
    expect(keyMatches({ key: 'up' }, press('up', true))).toBe(true);
  });

  it('requires the ctrl state the binding asks for', () => {
    expect(keyMatches({ key: 'c', ctrl: true }, press('c'))).toBe(false);
    expect(keyMatches({ key: 'c', ctrl: true }, press('c', true))).toBe(true);
  });
});

describe('resolveKeyAction', () => {
  it.each([
    ['down', 'MOVE_DOWN'],
    ['j', 'MOVE_DOWN'],
    ['up', 'MOVE_UP'],
    ['k', 'MOVE_UP'],
    ['space', 'ENTER'],
    ['right', 'ENTER'],
    ['backspace', 'BACK'],
    ['delete', 'BACK'],
    ['left', 'BACK'],
    ['return', 'CONFIRM'],
    ['q', 'CANCEL'],
    ['escape', 'CANCEL'],
  ])('maps %s to %s', (name, type) => {
    expect(resolveKeyAction(press(name))).toEqual({ type });
  });

  it('maps Ctrl+C to CANCEL', () => {
    expect(resolveKeyAction(press('c', true))).toEqual({ type: 'CANCEL' });
  });

  it('does not treat Ctrl+J or Ctrl+Q as navigation', () => {
    expect(resolveKeyAction(press('j', true))).toBeUndefined();
    expect(resolveKeyAction(press('q', true))).toBeUndefined();
  });

  it('ignores unbound keys', () => {
    expect(resolveKeyAction(press('x'))).toBeUndefined();
    expect(resolveKeyAction(press('c'))).toBeUndefined();
  });

  it('ignores key releases', () => {
    expect(
      resolveKeyAction({ name: 'return', ctrl: false, kind: 'release' }),
    ).toBeUndefined();
  });

  it('accepts custom bindings', () => {
    const bindings: KeyBindingConfig = {
      ...defaultKeyBindings,
      CONFIRM: [{ key: 'o' }],
    };

    expect(resolveKeyAction(press('o'), bindings)).toEqual({
      type: 'CONFIRM',
    });
    expect(resolveKeyAction(press('return'), bindings)).toBeUndefined();
  });
});
