export const BRAND_NAME = "spindle";

const BRAND_RUNTIME_VERSION = process.env.npm_package_version || "1.0.0";
export const BRAND_USER_AGENT = `${BRAND_NAME}/${BRAND_RUNTIME_VERSION}`;
