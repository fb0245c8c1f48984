/**
 * vitetags-cli
 *
 * Re-exports what a vitetags.config.ts needs
 */

export type { AppConfigInput, VitetagsSettings, DevServerProtocol } from 'vitetags-shared';

export { defineConfig } from 'vitetags-shared';
