import chalk, { Chalk } from "chalk";

export type Theme = {
  error: (text: string) => string;
  prompt: (text: string) => string;
};

/**
 * Colors follow chalk's own detection for the terminal; `color: false`
 * forces plain text.
 */
export function createTheme(color: boolean): Theme {
  const palette = new Chalk({ level: color ? chalk.level : 0 });
  return {
    error: (text) => palette.red(text),
    prompt: (text) => palette.cyan(text),
  };
}

export const plainTheme: Theme = createTheme(false);
