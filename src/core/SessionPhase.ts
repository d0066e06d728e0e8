import type { SessionPhase } from '../types';

const PHASE_LABELS: Record<SessionPhase, string> = {
  idle: 'Ready',
  listening: 'Listening',
  transcribing: 'Transcribing'
};

// Terminal stand-ins for the menu bar icons.
const PHASE_GLYPHS: Record<SessionPhase, string> = {
  idle: '○',
  listening: '●',
  transcribing: '◌'
};

export const isRecording = (phase: SessionPhase): boolean => phase === 'listening';

export const isTranscribing = (phase: SessionPhase): boolean => phase === 'transcribing';

export const phaseLabel = (phase: SessionPhase): string => PHASE_LABELS[phase];

export const phaseGlyph = (phase: SessionPhase): string => PHASE_GLYPHS[phase];
