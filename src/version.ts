export const NAME = 'lats';
export const VERSION = '0.1.0';
