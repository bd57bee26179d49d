// Entities
export * from './entities/AttemptState';
export * from './entities/DownloadOutcome';
export * from './entities/DownloadRequest';

// Interfaces
export * from './interfaces/IFileStorage';
export * from './interfaces/IHttpTransport';

// Services
export * from './services/BackoffPolicy';
export * from './services/ErrorClassifier';

// Value Objects
export * from './value-objects/DownloadUrl';
export * from './value-objects/Filename';
