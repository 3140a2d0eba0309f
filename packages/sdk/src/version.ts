export const SDK_VERSION = "1.0.0"

export const DEFAULT_USER_AGENT = `renderscreenshot-node/${SDK_VERSION}`
