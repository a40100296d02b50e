import ora, { type Ora } from 'ora';

export async function withSpinner<T>(text: string, fn: (spinner: Ora) => Promise<T>): Promise<T> {
  const spinner = ora(text).start();
  try {
    const result = await fn(spinner);
    if (spinner.isSpinning) spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
