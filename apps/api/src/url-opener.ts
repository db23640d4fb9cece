import { Logger } from '@nestjs/common';
import open from 'open';

import type { UrlOpener } from './context/tokens.js';

const logger = new Logger('UrlOpener');

/** Hands `url` to the desktop's default handler without waiting for it. */
export const openWithDefaultApp: UrlOpener = async (url) => {
  const child = await open(url);
  child.once('error', (error) => logger.error(`Handler for ${url} failed: ${error.message}`));
  if (child.pid === undefined) {
    throw new Error('No handler could be launched');
  }
};
