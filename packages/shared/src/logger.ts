import pc from 'picocolors';

export const log = {
  info: (msg: string) => console.log(`${pc.cyan('[vitetags]')} ${msg}`),
  success: (msg: string) => console.log(`${pc.green('[vitetags]')} ${msg}`),
  warn: (msg: string) => console.warn(`${pc.yellow('[vitetags]')} ${msg}`),
  error: (msg: string) => console.error(`${pc.red('[vitetags]')} ${msg}`),
};
