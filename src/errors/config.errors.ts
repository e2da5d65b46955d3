export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ConfigUnsupportedCategoryError extends ConfigurationError {
  constructor(category: string) {
    super(`Unsupported scan category: ${category}. Use sast, sca, secrets, iac or container.`);
    this.name = "ConfigUnsupportedCategoryError";
  }
}

export class ConfigUnsupportedToolError extends ConfigurationError {
  constructor(category: string, tool: string, supported: readonly string[]) {
    super(`Unsupported ${category} tool: ${tool}. Supported: ${supported.join(", ")}.`);
    this.name = "ConfigUnsupportedToolError";
  }
}

export class ConfigCategoryDisabledError extends ConfigurationError {
  constructor(category: string) {
    super(`Scan category ${category} is disabled in scanmesh.config.json.`);
    this.name = "ConfigCategoryDisabledError";
  }
}

export class ConfigInvalidValueError extends ConfigurationError {
  constructor(field: string, value: unknown, expected: string) {
    super(`Invalid value for ${field}: ${JSON.stringify(value)}. Expected ${expected}.`);
    this.name = "ConfigInvalidValueError";
  }
}

export class ConfigInvalidTargetError extends ConfigurationError {
  constructor(target: unknown) {
    super(`Invalid scan target: ${JSON.stringify(target)}. Pass a path or an image reference.`);
    this.name = "ConfigInvalidTargetError";
  }
}

export class ConfigFileParseError extends ConfigurationError {
  constructor(filePath: string, message: string) {
    super(`Could not parse ${filePath}: ${message}`);
    this.name = "ConfigFileParseError";
  }
}
