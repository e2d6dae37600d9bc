declare module 'http' {
  interface IncomingMessage {
    /** Path prefix the app is mounted under externally, set by the Lambda adapter. */
    rootPath?: string;
  }
}

export {};
