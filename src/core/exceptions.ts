/**
 * Custom exceptions for unpack operations.
 */

export class ExtractionFailedException extends Error {
  archivePath: string;

  constructor(archivePath: string, message?: string) {
    super(
      message
        ? `Extraction failed for ${archivePath}: ${message}`
        : `Extraction failed for ${archivePath}`,
    );
    this.name = "ExtractionFailedException";
    this.archivePath = archivePath;
  }
}

export class ArchiveProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchiveProcessingError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
