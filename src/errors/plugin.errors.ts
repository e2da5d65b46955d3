import { ConfigurationError } from "./config.errors.js";

export class PluginLifecycleError extends Error {
  plugin: string;
  phase: "initialize" | "cleanup" | "load";

  constructor(plugin: string, phase: "initialize" | "cleanup" | "load", message: string) {
    super(`Plugin ${plugin} failed during ${phase}: ${message}`);
    this.name = "PluginLifecycleError";
    this.plugin = plugin;
    this.phase = phase;
  }
}

export class PluginRoleError extends ConfigurationError {
  constructor(plugin: string, roles: readonly string[]) {
    super(
      roles.length
        ? `Plugin ${plugin} is ambiguous: it implements ${roles.join(", ")}. A plugin must implement exactly one role.`
        : `Plugin ${plugin} implements no plugin role (scanner, report or integration).`
    );
    this.name = "PluginRoleError";
  }
}

export class PluginIdentityError extends ConfigurationError {
  constructor(message: string) {
    super(`Invalid plugin identity: ${message}`);
    this.name = "PluginIdentityError";
  }
}
