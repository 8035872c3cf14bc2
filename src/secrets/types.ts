// Secret reference types

/** `secrets: [{ENV_NAME: locator}]` */
export interface ClassicSecretReference {
  kind: 'classic';
  envName: string;
  locator: string;
}

/** `secrets_envs: [{id, values: [KEY, ...]}]` */
export interface ByLocatorSecretReference {
  kind: 'by-locator';
  locator: string;
  keys: string[];
}

/** `secrets_envs: [{name}]`; keys are discovered remotely */
export interface ByNameSecretReference {
  kind: 'by-name';
  secretName: string;
}

/** `secrets_envs: [{id | name, env_name, auto_parse_keys_to_envs: false}]` */
export type WholeSecretReference = {
  kind: 'whole-secret';
  envName: string;
} & ({ locator: string; secretName?: undefined } | { secretName: string; locator?: undefined });

export type SecretReference =
  | ClassicSecretReference
  | ByLocatorSecretReference
  | ByNameSecretReference
  | WholeSecretReference;

/** A secret as it appears in a container definition. */
export interface ResolvedSecret {
  name: string;
  valueFrom: string;
}

export interface DiscoveredSecret {
  /** Full ARN, including the random suffix the secret store appends. */
  arn: string;
  /** Top-level keys of the JSON object stored in the secret. */
  keys: string[];
}

/**
 * Remote lookup used for secrets referenced by name only.
 * Implementations throw on any failure; the resolver turns that into a SecretResolutionError.
 */
export interface SecretKeyDiscovery {
  discoverKeys(secretName: string): Promise<DiscoveredSecret>;
  resolveArn(secretName: string): Promise<string>;
}
