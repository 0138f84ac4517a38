// ANSI escape codes for text styling
const styles = {
  // Reset all styles
  reset: '\x1b[0m',

  // Foreground colors
  red: '\x1b[31m',
  blue: '\x1b[34m',
};

const style = {
  red: (str: string) => `${styles.red}${str}${styles.reset}`,
  blue: (str: string) => `${styles.blue}${str}${styles.reset}`,
};

export default style;
