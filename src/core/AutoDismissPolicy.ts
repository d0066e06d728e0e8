export interface AutoDismissPolicy {
  successDelayMinSeconds: number;
  successDelayMaxSeconds: number;
  successDelayCharsPerSecond: number;
  errorDelaySeconds: number;
}

export const DEFAULT_AUTO_DISMISS_POLICY: AutoDismissPolicy = {
  successDelayMinSeconds: 1.5,
  successDelayMaxSeconds: 4.0,
  successDelayCharsPerSecond: 15,
  errorDelaySeconds: 3.0
};

/** How long a success result stays visible: longer text reads longer, within bounds. */
export const successDelaySeconds = (
  text: string,
  policy: AutoDismissPolicy = DEFAULT_AUTO_DISMISS_POLICY
): number => {
  const characters = Array.from(text.trim()).length;
  if (characters === 0 || policy.successDelayCharsPerSecond <= 0) {
    return policy.successDelayMinSeconds;
  }

  const readingSeconds = characters / policy.successDelayCharsPerSecond;
  return Math.min(policy.successDelayMaxSeconds, Math.max(policy.successDelayMinSeconds, readingSeconds));
};

export const errorDelaySeconds = (policy: AutoDismissPolicy = DEFAULT_AUTO_DISMISS_POLICY): number =>
  policy.errorDelaySeconds;
