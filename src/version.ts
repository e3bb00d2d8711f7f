export const NAME = 'gpuwatch';
export const VERSION = '0.4.0';
