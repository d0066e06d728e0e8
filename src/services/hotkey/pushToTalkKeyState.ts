import type { IGlobalKey, IGlobalKeyEvent } from 'node-global-key-listener';
import type { ParsedHotkey } from './hotkeyShortcut';

export type KeyEventSummary = Pick<IGlobalKeyEvent, 'name' | 'state'>;
export type IsKeyDown = (key: IGlobalKey) => boolean;

export interface KeyEventOutcome {
  /** True when the event belongs to the held combination and must not reach other apps. */
  swallow: boolean;
  transition?: 'onPress' | 'onRelease';
}

/**
 * Hold tracking for one binding. Press fires once per hold; release fires when the trigger
 * key or any required modifier goes up.
 */
export class PushToTalkKeyState {
  private active = false;

  public constructor(private binding: ParsedHotkey) {}

  public isActive(): boolean {
    return this.active;
  }

  /** Swaps the binding; reports whether a hold was cut short and needs a release. */
  public rebind(binding: ParsedHotkey): boolean {
    this.binding = binding;
    return this.reset();
  }

  public reset(): boolean {
    const wasActive = this.active;
    this.active = false;
    return wasActive;
  }

  public handle(event: KeyEventSummary, isDown: IsKeyDown): KeyEventOutcome {
    const keyName = event.name;
    if (!keyName) {
      return { swallow: false };
    }

    const isTriggerKey = keyName === this.binding.triggerKey;
    const modifiersHeld = this.binding.requiredModifierGroups.every((group) => group.some(isDown));
    const comboHeld = modifiersHeld && isDown(this.binding.triggerKey);

    if (event.state === 'DOWN' && isTriggerKey && modifiersHeld) {
      if (this.active) {
        return { swallow: true };
      }

      this.active = true;
      return { swallow: true, transition: 'onPress' };
    }

    if (this.active && ((event.state === 'UP' && isTriggerKey) || !comboHeld)) {
      this.active = false;
      return { swallow: true, transition: 'onRelease' };
    }

    return { swallow: this.active };
  }
}
