export interface HudPresenter {
  showListening(): void;
  showTranscribing(): void;
  updateTranscribingPreview(text: string): void;
  showSuccess(text: string): void;
  showWarning(hint: string): void;
  showError(hint: string): void;
  dismiss(): void;
  updateLevel(rms: number): void;
}
