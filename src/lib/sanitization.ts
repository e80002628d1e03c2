import * as path from 'path';
import { MetadataItem } from '../interfaces';
import { ValidationError } from './errors';

export { ValidationError };

/**
 * Sanitization utilities for job definitions, CLI options and configuration
 */

const RESOURCE_NAME = /^[a-z]([-a-z0-9]{0,61}[a-z0-9])?$/;

/**
 * Validates Compute Engine resource names (instances, images, families)
 */
export function sanitizeResourceName(name: string, fieldName: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError(`${fieldName} is required and must be a string`);
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.length > 63) {
    throw new ValidationError(`${fieldName} cannot exceed 63 characters`);
  }

  if (!RESOURCE_NAME.test(trimmed)) {
    throw new ValidationError(
      `${fieldName} must start with a lowercase letter and contain only lowercase letters, digits and hyphens`
    );
  }

  return trimmed;
}

/**
 * Validates job names, which double as instance names
 */
export function sanitizeJobName(name: string): string {
  return sanitizeResourceName(name, 'Job name');
}

/**
 * Validates project ids
 */
export function sanitizeProjectId(project: string): string {
  if (!project || typeof project !== 'string') {
    throw new ValidationError('Project is required');
  }

  const trimmed = project.trim();

  // Legacy domain-scoped projects look like example.com:my-project
  if (!/^([a-z0-9.-]+:)?[a-z][-a-z0-9]{4,28}[a-z0-9]$/.test(trimmed)) {
    throw new ValidationError(`Invalid project id: ${trimmed}`);
  }

  return trimmed;
}

/**
 * Validates zone names such as us-east1-c
 */
export function sanitizeZone(zone: string): string {
  if (!zone || typeof zone !== 'string') {
    throw new ValidationError('Zone is required');
  }

  const trimmed = zone.trim();

  if (!/^[a-z]+-[a-z]+[0-9]+-[a-z]$/.test(trimmed)) {
    throw new ValidationError(`Invalid zone: ${trimmed}`);
  }

  return trimmed;
}

/**
 * Validates machine types, including custom ones (custom-4-16384)
 */
export function sanitizeMachineType(machineType: string): string {
  return sanitizeResourceName(machineType, 'Machine type');
}

/**
 * Validates an accelerator mapping of type label to device count
 */
export function sanitizeAccelerators(
  accelerators: Record<string, unknown>
): Record<string, number> {
  if (!accelerators || typeof accelerators !== 'object') {
    throw new ValidationError('Accelerators must be an object');
  }

  const sanitized: Record<string, number> = {};

  for (const [label, count] of Object.entries(accelerators)) {
    const name = sanitizeResourceName(label, 'Accelerator type');

    if (typeof count !== 'number' || !Number.isInteger(count)) {
      throw new ValidationError(`Accelerator count for ${name} must be an integer`);
    }

    if (count < 1 || count > 16) {
      throw new ValidationError(
        `Accelerator count for ${name} must be between 1 and 16`
      );
    }

    sanitized[name] = count;
  }

  return sanitized;
}

/**
 * Parses repeated `label=count` CLI values into an accelerator mapping
 */
export function parseAccelerators(values: string[]): Record<string, number> {
  const mapping: Record<string, unknown> = {};

  for (const value of values) {
    const [label, count] = splitAssignment(value, 'Accelerator');
    mapping[label] = sanitizeNumber(count, `Accelerator count for ${label}`);
  }

  return sanitizeAccelerators(mapping);
}

/**
 * Validates metadata entries
 */
export function sanitizeMetadata(items: unknown): MetadataItem[] {
  if (!Array.isArray(items)) {
    throw new ValidationError('Metadata must be an array of key/value entries');
  }

  const reserved = ['ssh-keys', 'startup-script', 'enable-oslogin', 'serial-port-enable'];

  return items.map((item: unknown, index) => {
    if (typeof item !== 'object' || item === null) {
      throw new ValidationError(`Metadata entry ${index} must be an object`);
    }

    const key = 'key' in item ? item.key : undefined;
    const value = 'value' in item ? item.value : undefined;

    if (typeof key !== 'string' || !/^[a-zA-Z0-9_-]{1,128}$/.test(key)) {
      throw new ValidationError(
        `Metadata entry ${index} needs a key of letters, digits, dashes and underscores`
      );
    }

    if (reserved.includes(key)) {
      throw new ValidationError(`Metadata key ${key} is managed by flint`);
    }

    if (typeof value !== 'string') {
      throw new ValidationError(`Metadata value for ${key} must be a string`);
    }

    if (value.includes('\0')) {
      throw new ValidationError(`Metadata value for ${key} contains null bytes`);
    }

    return { key, value };
  });
}

/**
 * Parses repeated `key=value` CLI values into metadata entries
 */
export function parseMetadata(values: string[]): MetadataItem[] {
  return sanitizeMetadata(
    values.map((value) => {
      const [key, item] = splitAssignment(value, 'Metadata');
      return { key, value: item };
    })
  );
}

function splitAssignment(value: string, fieldName: string): [string, string] {
  const index = value.indexOf('=');

  if (index <= 0) {
    throw new ValidationError(`${fieldName} must be given as name=value`);
  }

  return [value.slice(0, index), value.slice(index + 1)];
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const num = parseInt(value, 10);

  if (isNaN(num)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates and resolves file paths, relative ones against `baseDir`
 */
export function sanitizeFilePath(
  filePath: string,
  fieldName: string,
  baseDir: string = process.cwd()
): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  const resolved = path.resolve(baseDir, trimmed);

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  if (!/^[a-zA-Z0-9.-]+$/.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  // Unix username validation
  if (!/^[a-z_][a-z0-9_-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  if (trimmed === 'root') {
    throw new ValidationError(
      'root cannot be used, Compute Engine images refuse root logins'
    );
  }

  return trimmed;
}
