import * as fs from 'fs';
import * as path from 'path';
import { JobSpec } from '../interfaces';
import { ConfigurationError } from './errors';
import {
  sanitizeAccelerators,
  sanitizeFilePath,
  sanitizeJobName,
  sanitizeMachineType,
  sanitizeMetadata,
  sanitizeResourceName,
  sanitizeProjectId,
  ValidationError,
} from './sanitization';

export const DEFAULT_MACHINE_TYPE = 'n1-standard-4';

/**
 * Shape of a job definition before validation. Paths are resolved against
 * `baseDir`.
 */
export interface JobInput {
  [field: string]: unknown;
  name?: unknown;
  script?: unknown;
  image?: unknown;
  imageProject?: unknown;
  machineType?: unknown;
  accelerators?: unknown;
  preemptible?: unknown;
  metadata?: unknown;
  startupScript?: unknown;
}

function requireString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required and must be a string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createJobSpec(
  input: JobInput,
  baseDir: string = process.cwd()
): JobSpec {
  if (input.accelerators !== undefined && !isRecord(input.accelerators)) {
    throw new ValidationError('accelerators must map type labels to counts');
  }

  if (input.preemptible !== undefined && typeof input.preemptible !== 'boolean') {
    throw new ValidationError('preemptible must be true or false');
  }

  return Object.freeze({
    name: sanitizeJobName(requireString(input.name, 'name')),
    scriptPath: sanitizeFilePath(
      requireString(input.script, 'script'),
      'script',
      baseDir
    ),
    imageFamily: sanitizeResourceName(
      requireString(input.image, 'image'),
      'Image family'
    ),
    imageProject:
      input.imageProject === undefined
        ? undefined
        : sanitizeProjectId(requireString(input.imageProject, 'imageProject')),
    machineType: sanitizeMachineType(
      input.machineType === undefined
        ? DEFAULT_MACHINE_TYPE
        : requireString(input.machineType, 'machineType')
    ),
    accelerators: sanitizeAccelerators(input.accelerators ?? {}),
    preemptible: input.preemptible ?? true,
    metadata: sanitizeMetadata(input.metadata ?? []),
    startupScriptPath:
      input.startupScript === undefined
        ? undefined
        : sanitizeFilePath(
            requireString(input.startupScript, 'startupScript'),
            'startupScript',
            baseDir
          ),
  });
}

/**
 * @description Reads a JSON job definition. Script paths inside it are
 * relative to the file.
 */
export function loadJobFile(filePath: string): JobSpec {
  const resolved = sanitizeFilePath(filePath, 'Job file');

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read job file ${resolved}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Job file ${resolved} is not valid JSON`, {
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Job file ${resolved} must contain an object`);
  }

  return createJobSpec(parsed, path.dirname(resolved));
}
