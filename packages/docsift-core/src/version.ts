export const NAME = 'docsift';
export const VERSION = '0.1.0';
