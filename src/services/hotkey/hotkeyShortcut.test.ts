import { describe, expect, it } from 'vitest';
import { HotkeyRegistrationError, parseHotkey } from './hotkeyShortcut';

describe('parseHotkey', () => {
  it('parses a modifier and a special key', () => {
    expect(parseHotkey('Option+Space')).toEqual({
      source: 'Option+Space',
      triggerKey: 'SPACE',
      requiredModifierGroups: [['LEFT ALT', 'RIGHT ALT']]
    });
  });

  it('accepts letters, digits and function keys with several modifiers', () => {
    expect(parseHotkey('CmdOrCtrl+Shift+d').triggerKey).toBe('D');
    expect(parseHotkey('Ctrl+7').triggerKey).toBe('7');
    expect(parseHotkey(' Alt + f12 ')).toMatchObject({
      triggerKey: 'F12',
      requiredModifierGroups: [['LEFT ALT', 'RIGHT ALT']]
    });
    expect(parseHotkey('Command+Shift+Enter').requiredModifierGroups).toHaveLength(2);
  });

  it('rejects a key without a modifier', () => {
    expect(() => parseHotkey('Space')).toThrow(HotkeyRegistrationError);
    expect(() => parseHotkey('A+B')).toThrow('Hotkey must define exactly one non-modifier key: A+B');
  });

  it('rejects modifiers without a trigger key', () => {
    expect(() => parseHotkey('Ctrl+Shift')).toThrow('Hotkey missing a trigger key: Ctrl+Shift');
  });

  it('rejects unsupported tokens', () => {
    expect(() => parseHotkey('Hyper+Nothing')).toThrow("Unsupported hotkey token 'Hyper' in Hyper+Nothing");
    expect(() => parseHotkey('Ctrl+F25')).toThrow(HotkeyRegistrationError);
  });
});
