import ora from "ora";

export const withSpinner = async <T>(
  run: () => Promise<T>,
  spinnerText: string,
  succeedText: (result: T) => string = () => spinnerText
): Promise<T> => {
  const spinner = ora(spinnerText).start();
  try {
    const result = await run();
    spinner.succeed(succeedText(result));
    return result;
  } catch (error) {
    spinner.fail(`${spinnerText} failed`);
    throw error;
  }
};
