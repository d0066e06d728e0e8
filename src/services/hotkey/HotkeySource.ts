export interface PushToTalkCallbacks {
  onPress: () => Promise<void> | void;
  onRelease: () => Promise<void> | void;
}

export interface HotkeySource {
  bind(callbacks: PushToTalkCallbacks): void;
  /** Replaces the active shortcut. Rejects with `HotkeyRegistrationError`. */
  register(shortcut: string): Promise<void>;
}
