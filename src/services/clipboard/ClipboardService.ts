export interface ClipboardService {
  copy(text: string): Promise<void>;
  /** Rejects with `AutoPasteError` when the paste keystroke cannot be sent. */
  autoPaste(): Promise<void>;
}
