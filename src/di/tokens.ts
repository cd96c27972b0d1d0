/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 * Composition roots (launcher, CLI) resolve through these; nothing below them
 * touches the container.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Operating-system family */
    Platform: Symbol('Runtime.Platform'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated bootstrap configuration */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** pino logger factory */
    LoggerFactory: Symbol('Infra.LoggerFactory'),
    /** Filesystem port used for discovery and scanning */
    FileSystem: Symbol('Infra.FileSystem'),
    /** Dynamic module importer behind the loader */
    ModuleImporter: Symbol('Infra.ModuleImporter'),
  },
} as const;
