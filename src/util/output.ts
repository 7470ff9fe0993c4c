/** Where user-facing text goes. Diagnostics use the logger (stderr) instead. */
export interface Output {
  print(text: string): void;
}

export const consoleOutput: Output = {
  print(text) {
    console.log(text);
  },
};
