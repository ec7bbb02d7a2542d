/**
 * BackupPolicy manifest parsing and validation
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { BackupPolicySpec, PolicyManifest, StorageDestination, StorageType } from "../types";
import { STORAGE_TYPES } from "../types";
import { isValidResourceName } from "../utils/naming";
import { isRecord } from "./validator";

export const API_VERSION = "backup-controller.io/v1alpha1";
export const POLICY_KIND = "BackupPolicy";
export const DEFAULT_NAMESPACE = "default";
export const DEFAULT_RETENTION_HOURS = 168;

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

function optionalString(source: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ManifestError(`${where}.${key} must be a string`);
  }
  return value;
}

function requiredString(source: Record<string, unknown>, key: string, where: string): string {
  const value = optionalString(source, key, where);
  if (value === undefined) {
    throw new ManifestError(`${where}.${key} is required`);
  }
  return value;
}

function isStorageType(value: unknown): value is StorageType {
  return typeof value === "string" && (STORAGE_TYPES as readonly string[]).includes(value);
}

function parseStorageDestination(value: unknown, where: string): StorageDestination {
  if (!isRecord(value)) {
    throw new ManifestError(`${where} must be an object`);
  }
  if (!isStorageType(value.type)) {
    throw new ManifestError(`${where}.type must be one of: ${STORAGE_TYPES.join(", ")}`);
  }

  const destination: StorageDestination = { type: value.type };
  const bucket = optionalString(value, "bucket", where);
  const destPath = optionalString(value, "path", where);
  const pvcName = optionalString(value, "pvcName", where);
  const secretName = optionalString(value, "secretName", where);
  if (bucket !== undefined) destination.bucket = bucket;
  if (destPath !== undefined) destination.path = destPath;
  if (pvcName !== undefined) destination.pvcName = pvcName;
  if (secretName !== undefined) destination.secretName = secretName;
  return destination;
}

function parseMatchLabels(value: unknown, where: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ManifestError(`${where}.matchLabels must be a map of strings`);
  }
  const labels: Record<string, string> = {};
  for (const [key, label] of Object.entries(value)) {
    if (typeof label !== "string") {
      throw new ManifestError(`${where}.matchLabels.${key} must be a string`);
    }
    labels[key] = label;
  }
  return labels;
}

/**
 * Validate a policy spec, filling in defaults
 */
export function parsePolicySpec(value: unknown, where = "spec"): BackupPolicySpec {
  if (!isRecord(value)) {
    throw new ManifestError(`${where} must be an object`);
  }

  const retention = value.backupRetention ?? DEFAULT_RETENTION_HOURS;
  if (typeof retention !== "number" || !Number.isInteger(retention) || retention < 1) {
    throw new ManifestError(`${where}.backupRetention must be a whole number of hours, at least 1`);
  }

  if (!isRecord(value.databaseSelector)) {
    throw new ManifestError(`${where}.databaseSelector is required`);
  }

  if (value.suspend !== undefined && typeof value.suspend !== "boolean") {
    throw new ManifestError(`${where}.suspend must be a boolean`);
  }

  const spec: BackupPolicySpec = {
    databaseType: requiredString(value, "databaseType", where),
    schedule: requiredString(value, "schedule", where),
    backupRetention: retention,
    storageDestination: parseStorageDestination(value.storageDestination, `${where}.storageDestination`),
    databaseSelector: {
      matchLabels: parseMatchLabels(
        value.databaseSelector.matchLabels ?? {},
        `${where}.databaseSelector`,
      ),
    },
  };

  const timezone = optionalString(value, "timezone", where);
  if (timezone !== undefined) spec.timezone = timezone;
  if (value.suspend === true) spec.suspend = true;

  return spec;
}

/**
 * Validate one manifest document
 */
export function parsePolicyManifest(doc: unknown): PolicyManifest {
  if (!isRecord(doc)) {
    throw new ManifestError("manifest must be an object");
  }
  if (doc.apiVersion !== API_VERSION) {
    throw new ManifestError(`apiVersion must be "${API_VERSION}"`);
  }
  if (doc.kind !== POLICY_KIND) {
    throw new ManifestError(`kind must be "${POLICY_KIND}"`);
  }
  if (!isRecord(doc.metadata)) {
    throw new ManifestError("metadata is required");
  }

  const name = requiredString(doc.metadata, "name", "metadata");
  const namespace = optionalString(doc.metadata, "namespace", "metadata") ?? DEFAULT_NAMESPACE;
  for (const [field, value] of [
    ["name", name],
    ["namespace", namespace],
  ] as const) {
    if (!isValidResourceName(value)) {
      throw new ManifestError(
        `metadata.${field} "${value}" must be lowercase alphanumerics and '-', at most 63 characters`,
      );
    }
  }

  return {
    apiVersion: API_VERSION,
    kind: POLICY_KIND,
    metadata: { namespace, name },
    spec: parsePolicySpec(doc.spec),
  };
}

/**
 * Parse every policy document in a YAML stream or JSON file.
 * JSON may hold a single document or an array of them.
 */
export function parseManifests(content: string, ext: string): PolicyManifest[] {
  let documents: unknown[];
  try {
    if (ext === ".json") {
      const parsed: unknown = JSON.parse(content);
      documents = Array.isArray(parsed) ? parsed : [parsed];
    } else if (ext === ".yaml" || ext === ".yml") {
      documents = yaml.loadAll(content);
    } else {
      throw new ManifestError(`Unsupported manifest format: ${ext}. Use .yaml, .yml, or .json`);
    }
  } catch (e) {
    if (e instanceof ManifestError) throw e;
    throw new ManifestError(`Failed to parse manifest: ${(e as Error).message}`);
  }

  const manifests: PolicyManifest[] = [];
  documents.forEach((doc, index) => {
    if (doc === null || doc === undefined) {
      return;
    }
    try {
      manifests.push(parsePolicyManifest(doc));
    } catch (e) {
      if (e instanceof ManifestError) {
        throw new ManifestError(`document ${index + 1}: ${e.message}`);
      }
      throw e;
    }
  });

  return manifests;
}

export async function loadManifests(filePath: string): Promise<PolicyManifest[]> {
  const absolutePath = path.resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new ManifestError(`Manifest file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  return parseManifests(content, path.extname(absolutePath).toLowerCase());
}
