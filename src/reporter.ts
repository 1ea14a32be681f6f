/**
 * Progress and warning output
 *
 * Progress goes to stderr so stdout stays free for usage text.
 */

export interface Reporter {
  readonly onProgress: (message: string) => void;
  readonly onWarning: (warning: string) => void;
}

export const consoleReporter: Reporter = {
  onProgress: (message) => console.error(message),
  onWarning: (warning) => console.warn(`Warning: ${warning}`),
};

/**
 * Reporter that discards everything
 */
export const silentReporter: Reporter = {
  onProgress: () => {},
  onWarning: () => {},
};
