import {
  GlobalKeyboardListener,
  type IGlobalKeyDownMap,
  type IGlobalKeyEvent,
  type IGlobalKeyListener
} from 'node-global-key-listener';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { HotkeySource, PushToTalkCallbacks } from './HotkeySource';
import { HotkeyRegistrationError, parseHotkey } from './hotkeyShortcut';
import { PushToTalkKeyState } from './pushToTalkKeyState';

/**
 * Global push-to-talk binding. Press fires once per hold; release fires when the trigger key
 * or any required modifier goes up. The combination is swallowed while held.
 */
export class PushToTalkHotkey implements HotkeySource {
  private listener: GlobalKeyboardListener | undefined;
  private readonly handler: IGlobalKeyListener;
  private keyState: PushToTalkKeyState | undefined;
  private callbacks: PushToTalkCallbacks | undefined;

  public constructor(private readonly logger?: StructuredLogger) {
    this.handler = (event, down) => {
      return this.onKeyEvent(event, down);
    };
  }

  public bind(callbacks: PushToTalkCallbacks): void {
    this.callbacks = callbacks;
  }

  public async register(shortcut: string): Promise<void> {
    const parsed = parseHotkey(shortcut);

    if (!this.listener) {
      const listener = new GlobalKeyboardListener();
      try {
        await listener.addListener(this.handler);
      } catch (error) {
        listener.kill();
        const detail = error instanceof Error ? error.message : String(error);
        throw new HotkeyRegistrationError(`Global key listener could not start: ${detail}`);
      }

      this.listener = listener;
    }

    if (!this.keyState) {
      this.keyState = new PushToTalkKeyState(parsed);
    } else if (this.keyState.rebind(parsed)) {
      this.invokeSafely('onRelease');
    }

    this.logger?.info('Push-to-talk hotkey registered', {
      hotkey: parsed.source
    });
  }

  public stop(): void {
    if (this.listener) {
      this.listener.removeListener(this.handler);
      this.listener.kill();
    }

    this.listener = undefined;
    this.keyState?.reset();

    this.logger?.info('Push-to-talk hotkey listener stopped');
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    if (!this.keyState) {
      return false;
    }

    const outcome = this.keyState.handle(event, (key) => Boolean(down[key]));
    if (outcome.transition) {
      this.invokeSafely(outcome.transition);
    }

    return outcome.swallow;
  }

  private invokeSafely(action: keyof PushToTalkCallbacks): void {
    const callback = this.callbacks?.[action];
    if (!callback) {
      return;
    }

    Promise.resolve()
      .then(() => callback())
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error(`Push-to-talk ${action} callback failed`, {
          detail
        });
      });
  }
}
