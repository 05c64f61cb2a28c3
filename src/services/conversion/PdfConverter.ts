/**
 * PDF conversion through a headless Chromium instance
 */

import { pathToFileURL } from 'node:url';
import puppeteer from 'puppeteer-core';
import logger from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';
import type { ArtifactConverter } from './ArtifactConverter.js';

export interface PdfPage {
  goto(
    url: string,
    options: { waitUntil: 'networkidle0'; timeout: number }
  ): Promise<unknown>;
  pdf(options: {
    path: string;
    format: 'A4';
    printBackground: boolean;
    margin: { top: string; right: string; bottom: string; left: string };
  }): Promise<unknown>;
  close(): Promise<void>;
}

export interface PdfBrowser {
  newPage(): Promise<PdfPage>;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  executablePath: string;
  headless: boolean;
  args: string[];
}

export type BrowserLauncher = (
  options: BrowserLaunchOptions
) => Promise<PdfBrowser>;

export interface PdfConverterConfig {
  executablePath: string;
  /**
   * Delay after the network goes idle so late fonts and images can paint
   */
  settleDelayMs?: number;
  navigationTimeoutMs?: number;
  launch?: BrowserLauncher;
  sleep?: Sleep;
}

const PAGE_MARGIN = '10mm';

// Chromium flags for running inside containers
const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
];

export class PdfConverter implements ArtifactConverter {
  private config: Required<PdfConverterConfig>;
  private browser: PdfBrowser | null = null;

  constructor(config: PdfConverterConfig) {
    this.config = {
      settleDelayMs: 1000,
      navigationTimeoutMs: 60000,
      launch: (options) => puppeteer.launch(options),
      sleep: defaultSleep,
      ...config,
    };
  }

  async convert(documentPath: string, artifactPath: string): Promise<void> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();

    try {
      await page.goto(pathToFileURL(documentPath).href, {
        waitUntil: 'networkidle0',
        timeout: this.config.navigationTimeoutMs,
      });
      await this.config.sleep(this.config.settleDelayMs);
      await page.pdf({
        path: artifactPath,
        format: 'A4',
        printBackground: true,
        margin: {
          top: PAGE_MARGIN,
          right: PAGE_MARGIN,
          bottom: PAGE_MARGIN,
          left: PAGE_MARGIN,
        },
      });
      logger.debug('PDF generated', { documentPath, artifactPath });
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    if (!this.browser) {
      return;
    }

    const browser = this.browser;
    this.browser = null;
    try {
      await browser.close();
    } catch (error) {
      logger.warn('Failed to close Chromium', { error });
    }
  }

  private async getBrowser(): Promise<PdfBrowser> {
    if (!this.browser) {
      logger.debug('Launching Chromium', {
        executablePath: this.config.executablePath,
      });
      this.browser = await this.config.launch({
        executablePath: this.config.executablePath,
        headless: true,
        args: CHROMIUM_ARGS,
      });
    }
    return this.browser;
  }
}
