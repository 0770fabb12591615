export const BROWSEROS_VERSION = "0.39.0.3";

export const CDN_BASE_URL = "http://cdn.browseros.com/releases";

export const CLI_NAME = "agent-browser";

export const EXECUTABLE_ENV_VAR = "AGENT_BROWSER_EXECUTABLE_PATH";

// Overrides the default install root when --install-dir is not given
export const INSTALL_ROOT_ENV_VAR = "BROWSEROS_HOME";

export const INSTALL_DIR_NAME = ".browseros";

export const APP_BUNDLE_NAME = "BrowserOS.app";

export const EXECUTABLE_NAME = "BrowserOS";

export const WINDOWS_DEFAULT_EXECUTABLE = "C:\\Program Files\\BrowserOS\\BrowserOS.exe";
