import type { IGlobalKey } from 'node-global-key-listener';

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
}

export class HotkeyRegistrationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'HotkeyRegistrationError';
  }
}

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE'
};

const normalizeMainKeyToken = (token: string): IGlobalKey | undefined => {
  if (/^[a-z]$/i.test(token)) {
    return token.toUpperCase() as IGlobalKey;
  }

  if (/^[0-9]$/.test(token)) {
    return token as IGlobalKey;
  }

  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(token)) {
    return token.toUpperCase() as IGlobalKey;
  }

  return undefined;
};

/** Parses an accelerator such as `Option+Space` or `CmdOrCtrl+Shift+D`. */
export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length < 2) {
    throw new HotkeyRegistrationError(
      `Hotkey must include at least one modifier and one key for push-to-talk: ${accelerator}`
    );
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!candidate) {
      throw new HotkeyRegistrationError(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new HotkeyRegistrationError(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (!trigger) {
    throw new HotkeyRegistrationError(`Hotkey missing a trigger key: ${accelerator}`);
  }

  if (modifierGroups.length === 0) {
    throw new HotkeyRegistrationError(`Hotkey must include at least one modifier key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};
