export type { ArtifactConverter } from './ArtifactConverter.js';
export { PdfConverter } from './PdfConverter.js';
export type { PdfConverterConfig, BrowserLauncher } from './PdfConverter.js';
