/**
 * Dependency injection token registry.
 *
 * Organized by layer. To add a service:
 * 1. Add its token here
 * 2. Decorate the class with `@singleton()` and `@inject(DI.x)` on every
 *    constructor parameter (vitest does not emit decorator metadata)
 * 3. Alias the token to the class in `container.ts`
 */
export const DI = {
  Services: {
    /** Browse, download, upload, remove, mkdir, paste */
    FileBrowser: Symbol('Services.FileBrowser'),
    /** Pattern and symlink based exclusion */
    Exclusion: Symbol('Services.Exclusion'),
  },

  Infra: {
    FileSystem: Symbol('Infra.FileSystem'),
    HttpServer: Symbol('Infra.HttpServer'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Runtime: {
    Mode: Symbol('Runtime.Mode'),
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Composition roots only */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Config: {
    /** Complete validated configuration */
    App: Symbol('Config.App'),
  },
} as const;

export type DIToken = (typeof DI)[keyof typeof DI][keyof (typeof DI)[keyof typeof DI]];
