import { MicrophonePermissionError, TranscriptionError } from './errors';
import type { DisplayLanguage } from '../types';

type HintKey = 'network' | 'noSpeech' | 'micAccess' | 'retry' | 'pasteFailed' | 'warning';

const HINTS: Record<DisplayLanguage, Record<HintKey, string>> = {
  en: {
    network: 'Network',
    noSpeech: 'No speech',
    micAccess: 'Mic access',
    retry: 'Try again',
    pasteFailed: 'Paste failed',
    warning: 'Warning'
  },
  zh: {
    network: '网络异常',
    noSpeech: '未识别语音',
    micAccess: '麦克风未授权',
    retry: '请重试',
    pasteFailed: '粘贴失败',
    warning: '警告'
  }
};

export const displayLanguage = (preferredLanguages: readonly string[]): DisplayLanguage =>
  preferredLanguages[0]?.toLowerCase().startsWith('zh') ? 'zh' : 'en';

const classifyMessage = (message: string): HintKey => {
  const lowered = message.toLowerCase();
  if (lowered.includes('network') || lowered.includes('timed out') || message.includes('网络')) {
    return 'network';
  }

  if (
    lowered.includes('no speech') ||
    lowered.includes('too short') ||
    message.includes('未识别') ||
    message.includes('太短')
  ) {
    return 'noSpeech';
  }

  return 'retry';
};

const classifyError = (error: unknown): HintKey => {
  if (error instanceof TranscriptionError) {
    switch (error.failure.kind) {
      case 'network':
      case 'timeout':
        return 'network';
      case 'emptyText':
      case 'audioFileNotReady':
        return 'noSpeech';
      default:
        return 'retry';
    }
  }

  if (error instanceof MicrophonePermissionError) {
    return 'micAccess';
  }

  return classifyMessage(error instanceof Error ? error.message : String(error));
};

/** Maps any failure to a hint short enough for the HUD. */
export const shortError = (error: unknown, language: DisplayLanguage): string => HINTS[language][classifyError(error)];

export const shortWarning = (message: string, language: DisplayLanguage): string => {
  const isPaste = message.toLowerCase().includes('paste') || message.includes('粘贴');
  return HINTS[language][isPaste ? 'pasteFailed' : 'warning'];
};

export const warningSubtitle = (language: DisplayLanguage): string =>
  language === 'zh' ? '已复制，但自动粘贴失败' : 'Copied, but auto paste failed';

export const errorSubtitle = (language: DisplayLanguage): string =>
  language === 'zh' ? '未识别语音或网络异常' : 'No speech or network issue';

export const hotkeyRegistrationFailed = (language: DisplayLanguage): string =>
  language === 'zh' ? '快捷键注册失败，已恢复原快捷键' : 'Hotkey registration failed; previous shortcut restored';

export const hotkeyUpdated = (shortcut: string, language: DisplayLanguage): string =>
  language === 'zh' ? `快捷键已设为 ${shortcut}` : `Hotkey set to ${shortcut}`;
