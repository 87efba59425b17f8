import clipboardy from 'clipboardy';

export interface Clipboard {
  /** Current text contents. Throws NoTextAvailableError when there is none. */
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export class NoTextAvailableError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Clipboard does not contain text', options);
    this.name = 'NoTextAvailableError';
  }
}

// clipboardy reports an image or empty clipboard as '' on most platforms
export const systemClipboard: Clipboard = {
  async read() {
    let text: string;
    try {
      text = await clipboardy.read();
    } catch (error) {
      throw new NoTextAvailableError({ cause: error });
    }
    if (text === '') throw new NoTextAvailableError();
    return text;
  },

  async write(text) {
    await clipboardy.write(text);
  },
};
