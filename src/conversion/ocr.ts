import Tesseract from 'tesseract.js';

/**
 * Recognizes the text of each image with one tesseract worker, terminated
 * when done or when `signal` aborts.
 */
export async function recognizeText(images: Buffer[], lang: string, signal: AbortSignal): Promise<string[]> {
  const worker = await Tesseract.createWorker(lang);
  let terminating: Promise<void> | null = null;
  const terminate = (): Promise<void> =>
    (terminating ??= worker.terminate().then(
      () => undefined,
      (err: unknown) => console.warn(`[PID ${process.pid}] [OCR] terminate failed: ${err}`),
    ));
  const stop = () => {
    void terminate();
  };
  signal.addEventListener('abort', stop, { once: true });

  try {
    const pages: string[] = [];
    for (const image of images) {
      signal.throwIfAborted();
      const { data } = await worker.recognize(image);
      pages.push(data.text);
    }
    return pages;
  } finally {
    signal.removeEventListener('abort', stop);
    await terminate();
  }
}
