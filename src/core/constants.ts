export const APP_NAME = "lrc-sync";
export const APP_VERSION = "0.1.0";
export const APP_HOMEPAGE = "https://github.com/lrc-sync/lrc-sync";
export const LRCLIB_CLIENT_HEADER = `${APP_NAME}/${APP_VERSION} (${APP_HOMEPAGE})`;

export const DEFAULT_LRCLIB_URL = "https://lrclib.net";
export const DEFAULT_TOLERANCE_SECONDS = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;
export const IGNORE_FILE_NAME = ".lrcsyncignore";
export const LRC_EXTENSION = ".lrc";
