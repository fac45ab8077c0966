/**
 * Canonical manifest model.
 *
 * Every polymorphic Compose field is reduced to one shape here; rules only
 * ever see these types and never the raw YAML tree.
 */

export interface ImageReference {
  /** Reference exactly as written */
  readonly raw: string;
  /** Registry host, present only when the reference names one */
  readonly registry?: string;
  readonly repository: string;
  /** `latest` when neither a tag nor a digest is given */
  readonly tag: string;
  readonly digest?: string;
}

/**
 * A field written as a variable substitution; kept as written, never resolved
 */
export interface UnresolvedValue {
  readonly expression: string;
}

export type EnvValue =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'substitution'; readonly expression: string }
  | { readonly kind: 'inherited' };

export type MountMode = 'rw' | 'ro';

/** `substitution` when the source starts with a variable and cannot be classified */
export type MountKind = 'namedVolume' | 'bindMount' | 'substitution';

export interface VolumeMount {
  /** Host path or volume name; empty for anonymous volumes */
  readonly source: string;
  readonly target: string;
  readonly mode: MountMode;
  /** Derived from `source`, see `classifyMountSource` */
  readonly kind: MountKind;
}

export interface PortRange {
  readonly start: number;
  readonly end: number;
}

export interface PortBinding {
  /** `0.0.0.0` when the manifest names no interface */
  readonly hostInterface: string;
  /** Absent when the runtime picks an ephemeral host port */
  readonly hostPort?: PortRange | UnresolvedValue;
  readonly containerPort: PortRange | UnresolvedValue;
  readonly protocol: string;
}

export const RESTART_POLICIES = ['no', 'always', 'on-failure', 'unless-stopped'] as const;
export type RestartPolicy = (typeof RESTART_POLICIES)[number];

export interface ServiceDefinition {
  readonly name: string;
  readonly image?: ImageReference;
  readonly privileged: boolean;
  readonly capabilitiesAdded: ReadonlySet<string>;
  readonly command?: string;
  readonly networkMode?: string;
  readonly volumeMounts: readonly VolumeMount[];
  readonly environment: ReadonlyMap<string, EnvValue>;
  readonly user?: string;
  readonly securityOptions: ReadonlySet<string>;
  readonly ports: readonly PortBinding[];
  readonly restartPolicy?: RestartPolicy | UnresolvedValue;
  readonly explicitNetworks: ReadonlySet<string>;
  /** Informational only; the linter does not traverse dependencies */
  readonly dependsOn: ReadonlySet<string>;
  readonly hasHealthcheck: boolean;
}

export interface NetworkDeclaration {
  readonly name: string;
  readonly external: boolean;
  readonly driver?: string;
}

export interface ManifestDocument {
  readonly path: string;
  readonly services: ReadonlyMap<string, ServiceDefinition>;
  readonly networks: ReadonlyMap<string, NetworkDeclaration>;
  readonly volumes: ReadonlySet<string>;
}
