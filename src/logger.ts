export class Logger {
  static debugMode = false;

  static log(...args: unknown[]) {
    if (Logger.debugMode) {
      console.log(...args);
    }
  }

  static warn(...args: unknown[]) {
    console.error(...args);
  }

  static enableDebug() {
    Logger.debugMode = true;
  }

  static disableDebug() {
    Logger.debugMode = false;
  }
}
