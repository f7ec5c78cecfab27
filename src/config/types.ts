// Configuration-specific types
export interface AWSSettings {
  region: string;
}

export interface ProvisioningSettings {
  wait_timeout_seconds: number;
  enforce_subnet_containment: boolean;
  tags: Record<string, string>;
}

export interface NetworkSettings {
  aws: AWSSettings;
  provisioning: ProvisioningSettings;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface SettingsLoader {
  load(path: string): Promise<NetworkSettings>;
}
