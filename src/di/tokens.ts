/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW PORT:
 * 1. Add token here under the appropriate namespace
 * 2. Register a factory in container.ts (instanceCachingFactory)
 * 3. Resolve with container.resolve<YourPort>(DI.Files.YourPort)
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete file store configuration (validated). */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory; components ask it for a child logger. */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // FILE STORE
  // Ports first, then the facade that composes them.
  // ═══════════════════════════════════════════════════════════════════
  Files: {
    FileSystem: Symbol('Files.FileSystem'),
    /** Initialized once; creates the durable and cache roots. */
    StorageRoot: Symbol('Files.StorageRoot'),
    Locator: Symbol('Files.Locator'),
    BlobStore: Symbol('Files.BlobStore'),
    AuxState: Symbol('Files.AuxState'),
    ContentInspector: Symbol('Files.ContentInspector'),
    /** External collaborator; hosts may register their own before init. */
    ContentResolver: Symbol('Files.ContentResolver'),
    BundledAssets: Symbol('Files.BundledAssets'),
    BundledSchema: Symbol('Files.BundledSchema'),
    FileStore: Symbol('Files.FileStore'),
  },
} as const;
