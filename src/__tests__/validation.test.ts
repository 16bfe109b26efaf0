import { describe, it, expect } from 'vitest';
import {
  getAcrName,
  isValidAwsRegion,
  isValidRegistryUrl,
  normalizeSourceRegistry,
  parseImageList,
  validateAwsRegion,
} from '../utils/validation.js';

describe('isValidRegistryUrl', () => {
  it('should accept http and https URLs with a host', () => {
    expect(isValidRegistryUrl('https://registry.example.com')).toBe(true);
    expect(isValidRegistryUrl('http://localhost:5000')).toBe(true);
    expect(isValidRegistryUrl('https://registry.example.com/team')).toBe(true);
  });

  it('should reject addresses without a scheme', () => {
    expect(isValidRegistryUrl('registry.example.com')).toBe(false);
    expect(isValidRegistryUrl('')).toBe(false);
    expect(isValidRegistryUrl('not a url')).toBe(false);
  });

  it('should reject other schemes', () => {
    expect(isValidRegistryUrl('ftp://registry.example.com')).toBe(false);
    expect(isValidRegistryUrl('file:///etc/passwd')).toBe(false);
  });
});

describe('normalizeSourceRegistry', () => {
  it('should strip the https:// prefix', () => {
    expect(normalizeSourceRegistry('https://registry.example.com')).toBe('registry.example.com');
  });

  it('should leave everything after the prefix untouched', () => {
    expect(normalizeSourceRegistry('https://registry.example.com:5000/team/')).toBe(
      'registry.example.com:5000/team/'
    );
  });

  it('should not change other addresses', () => {
    expect(normalizeSourceRegistry('http://localhost:5000')).toBe('http://localhost:5000');
    expect(normalizeSourceRegistry('registry.example.com')).toBe('registry.example.com');
  });
});

describe('isValidAwsRegion', () => {
  it('should accept valid AWS regions', () => {
    expect(isValidAwsRegion('us-east-1')).toBe(true);
    expect(isValidAwsRegion('eu-west-2')).toBe(true);
    expect(isValidAwsRegion('ap-northeast-1')).toBe(true);
    expect(isValidAwsRegion('us-gov-west-1')).toBe(true);
  });

  it('should reject invalid region formats', () => {
    expect(isValidAwsRegion('')).toBe(false);
    expect(isValidAwsRegion('us-east')).toBe(false);
    expect(isValidAwsRegion('US-EAST-1')).toBe(false);
    expect(isValidAwsRegion('us-east-1a')).toBe(false);
    expect(isValidAwsRegion('us-east-1; rm -rf /')).toBe(false);
  });
});

describe('validateAwsRegion', () => {
  it('should not throw for valid regions', () => {
    expect(() => validateAwsRegion('us-east-1')).not.toThrow();
  });

  it('should include field name in error message', () => {
    expect(() => validateAwsRegion('bad', 'ECR region')).toThrow(/Invalid ECR region: "bad"/);
  });
});

describe('getAcrName', () => {
  it('should return the first DNS label', () => {
    expect(getAcrName('myacr.azurecr.io')).toBe('myacr');
    expect(getAcrName('myacr')).toBe('myacr');
  });
});

describe('parseImageList', () => {
  it('should split, trim and drop blanks', () => {
    expect(parseImageList(' app/api:v1, app/web:v2 ,,')).toEqual(['app/api:v1', 'app/web:v2']);
  });

  it('should return an empty list for an empty string', () => {
    expect(parseImageList('')).toEqual([]);
  });
});
