const reset = "\x1b[0m";

const colorMap = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",
  underscore: "\x1b[4m",
  reverse: "\x1b[7m",
  //colors
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
};

export type Decorator = (input: unknown) => string;

const paint =
  (code: string): Decorator =>
  (input: unknown) =>
    `${code}${input}${reset}`;

export const decorators = {
  reset: paint(colorMap.reset),
  bright: paint(colorMap.bright),
  dim: paint(colorMap.dim),
  underscore: paint(colorMap.underscore),
  reverse: paint(colorMap.reverse),
  red: paint(colorMap.red),
  green: paint(colorMap.green),
  yellow: paint(colorMap.yellow),
  blue: paint(colorMap.blue),
  magenta: paint(colorMap.magenta),
  cyan: paint(colorMap.cyan),
  white: paint(colorMap.white),
};
