export const APP_NAME = 'transome';
export const APP_VERSION = '0.2.0';
export const APP_DESCRIPTION = 'A simple command-line translator backed by large language models.';
