// src/core/errors.ts

/**
 * Typed error catalog. Every failure the core reports is one of these,
 * discriminated by `kind`, so callers can map them to messages or exit
 * codes without parsing text.
 */

export type DirplateErrorKind =
   | 'PatternSyntax'
   | 'AlreadyExists'
   | 'NotFound'
   | 'IOFailure'
   | 'DestinationNotEmpty'
   | 'RegistryCorrupt'
   | 'InvalidName'
   | 'Cancelled'
   | 'SymlinkLoop'
   | 'Locked'
   | 'ConfigInvalid';

export class DirplateError extends Error {
   constructor(
      public readonly kind: DirplateErrorKind,
      message: string,
      public readonly details?: Record<string, unknown>,
      options?: { cause?: unknown },
   ) {
      super(message, options);
      this.name = this.constructor.name;
   }

   toJSON(): Record<string, unknown> {
      return {
         kind: this.kind,
         message: this.message,
         ...(this.details !== undefined && { details: this.details }),
      };
   }
}

export function isDirplateError(err: unknown): err is DirplateError {
   return err instanceof DirplateError;
}

export class PatternSyntaxError extends DirplateError {
   constructor(
      public readonly pattern: string,
      public readonly reason: string,
   ) {
      super('PatternSyntax', `Invalid ignore pattern "${pattern}": ${reason}`, { pattern, reason });
   }
}

export class TemplateExistsError extends DirplateError {
   constructor(public readonly templateName: string) {
      super('AlreadyExists', `Template "${templateName}" already exists`, { name: templateName });
   }
}

export class TemplateNotFoundError extends DirplateError {
   constructor(public readonly templateName: string) {
      super('NotFound', `Template "${templateName}" does not exist`, { name: templateName });
   }
}

export class InvalidTemplateNameError extends DirplateError {
   constructor(
      public readonly templateName: string,
      reason: string,
   ) {
      super('InvalidName', `Invalid template name "${templateName}": ${reason}`, {
         name: templateName,
         reason,
      });
   }
}

/**
 * A filesystem operation failed. `path` is the entry that could not be
 * read or written; `code` is the errno code when the system gave one.
 */
export class IoFailureError extends DirplateError {
   public readonly code: string | undefined;

   constructor(
      public readonly path: string,
      public readonly operation: string,
      cause: unknown,
   ) {
      const code =
         cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
            ? cause.code
            : undefined;
      const reason = cause instanceof Error ? cause.message : String(cause);
      super('IOFailure', `Failed to ${operation} ${path}: ${reason}`, { path, operation, code }, { cause });
      this.code = code;
   }
}

export class DestinationNotEmptyError extends DirplateError {
   constructor(public readonly path: string) {
      super('DestinationNotEmpty', `Destination ${path} already exists and is not empty`, { path });
   }
}

export class RegistryCorruptError extends DirplateError {
   constructor(
      public readonly path: string,
      reason: string,
      cause?: unknown,
   ) {
      super('RegistryCorrupt', `Registry file ${path} is unreadable: ${reason}`, { path, reason }, { cause });
   }
}

export class CopyCancelledError extends DirplateError {
   constructor(public readonly path: string | undefined) {
      super(
         'Cancelled',
         path ? `Copy cancelled before ${path}` : 'Copy cancelled',
         path ? { path } : undefined,
      );
   }
}

export class SymlinkLoopError extends DirplateError {
   constructor(
      public readonly path: string,
      public readonly target: string,
   ) {
      super('SymlinkLoop', `Symbolic link ${path} points back into its own ancestor ${target}`, {
         path,
         target,
      });
   }
}

export class RegistryLockedError extends DirplateError {
   constructor(
      public readonly lockPath: string,
      waitedMs: number,
   ) {
      super('Locked', `Registry is locked by another process (${lockPath}, waited ${waitedMs}ms)`, {
         lockPath,
         waitedMs,
      });
   }
}

export class ConfigInvalidError extends DirplateError {
   constructor(
      public readonly configPath: string,
      reason: string,
      cause?: unknown,
   ) {
      super('ConfigInvalid', `Invalid config ${configPath}: ${reason}`, { configPath, reason }, { cause });
   }
}
