import chalk from "chalk";

export const dim = chalk.gray;
export const highlight = chalk.yellowBright;
export const statusSuccess = chalk.greenBright;
