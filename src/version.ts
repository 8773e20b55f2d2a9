export const SERVER_NAME = 'reqclarity';
export const SERVER_VERSION = '0.1.0';
