export const PRODUCT_NAME = 'padkit';
export const CLI_NAME = 'padkit';
export const CLI_VERSION = '1.2.0';

export const CONFIG_FILE_NAME = 'padkit.config.json';
export const CONFIG_VERSION = '1';
