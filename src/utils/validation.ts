/**
 * Input validation for registry addresses, image names and AWS regions
 */

/**
 * AWS Region format: e.g., us-east-1, eu-west-2, ap-northeast-1
 */
const AWS_REGION_REGEX = /^[a-z]{2}-[a-z]+-\d$/;

/**
 * Regions whose names do not fit the two-letter pattern above
 */
const IRREGULAR_AWS_REGIONS = new Set([
  'us-gov-east-1',
  'us-gov-west-1',
  'cn-north-1',
  'cn-northwest-1',
]);

const ALLOWED_URL_PROTOCOLS = new Set(['http:', 'https:']);

const HTTPS_PREFIX = 'https://';

/**
 * Check that a source registry address is a well-formed http(s) URL with a host
 * @param url - The address to check, e.g. https://registry.example.com
 */
export function isValidRegistryUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  return ALLOWED_URL_PROTOCOLS.has(parsed.protocol) && parsed.hostname.length > 0;
}

/**
 * Strip the https:// prefix the Docker Engine does not accept in image references.
 * Nothing else about the address is changed.
 */
export function normalizeSourceRegistry(url: string): string {
  return url.startsWith(HTTPS_PREFIX) ? url.slice(HTTPS_PREFIX.length) : url;
}

export function isValidAwsRegion(region: string): boolean {
  return AWS_REGION_REGEX.test(region) || IRREGULAR_AWS_REGIONS.has(region);
}

/**
 * Validate AWS region and throw if invalid
 * @param fieldName - Name of the field for error message
 * @throws Error if the region is invalid
 */
export function validateAwsRegion(region: string, fieldName = 'AWS region'): void {
  if (!isValidAwsRegion(region)) {
    throw new Error(
      `Invalid ${fieldName}: "${region}". Expected a valid AWS region (e.g., us-east-1, eu-west-2).`
    );
  }
}

/**
 * Short ACR registry name: the first DNS label of the login server.
 * e.g. "myacr.azurecr.io" -> "myacr"
 */
export function getAcrName(registry: string): string {
  return registry.split('.')[0];
}

/**
 * Split a comma-separated image list, dropping blanks
 */
export function parseImageList(value: string): string[] {
  return value
    .split(',')
    .map(image => image.trim())
    .filter(image => image.length > 0);
}
