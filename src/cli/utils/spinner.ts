import ora, { type Ora } from 'ora';

export function createSpinner(text: string, enabled: boolean = true): Ora {
  return ora({
    text,
    spinner: 'dots',
    // Spinner frames go to stderr; disabled when output is piped or JSON
    isEnabled: enabled && process.stderr.isTTY === true,
  });
}

/**
 * Run an async operation with a spinner. The success text may be derived
 * from the result.
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>,
  options: {
    successText?: string | ((result: T) => string);
    failText?: string;
    enabled?: boolean;
  } = {}
): Promise<T> {
  const spinner = createSpinner(text, options.enabled ?? true);
  spinner.start();

  try {
    const result = await operation();
    const successText =
      typeof options.successText === 'function'
        ? options.successText(result)
        : options.successText ?? text;
    spinner.succeed(successText);
    return result;
  } catch (error) {
    spinner.fail(options.failText ?? `Failed: ${text}`);
    throw error;
  }
}
