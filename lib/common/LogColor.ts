import chalk from 'chalk';

/**
 * Colors applied to console log output.
 */
export default class LogColor {
  public static green = chalk.green;
  public static lightBlue = chalk.cyan;
  public static red = chalk.red;
  public static yellow = chalk.yellow;
}
