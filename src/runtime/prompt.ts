import { createInterface } from "node:readline";

export type PromptOptions = {
  defaultValue?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

export const promptYesNo = async (
  message: string,
  options: PromptOptions = {}
): Promise<boolean> => {
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  return new Promise((resolve) => {
    let answered = false;
    // stdin が閉じられた場合は既定値で確定する
    rl.once("close", () => {
      if (!answered) resolve(options.defaultValue ?? false);
    });
    rl.question(message, (answer) => {
      answered = true;
      rl.close();
      resolve(interpretAnswer(answer, options.defaultValue ?? false));
    });
  });
};

export function interpretAnswer(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized.length === 0) return defaultValue;
  return normalized === "y" || normalized === "yes";
}

export const createConfirm =
  ({ assumeYes }: { assumeYes: boolean }) =>
  (description: string): Promise<boolean> => {
    if (assumeYes) return Promise.resolve(true);
    return promptYesNo(`${description}\nType 'y' to continue [y/N]: `, { defaultValue: false });
  };
