export const SDK_VERSION = '0.1.0';
export const USER_AGENT = `agentreg-sdk/${SDK_VERSION}`;
export const REGISTER_PATH = '/register';
export const VERIFY_PATH = '/verify';
export const LOGIN_PATH = '/auth/login';
export const HEALTH_PATH = '/health';
