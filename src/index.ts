export * from './domain';
export * from './shared';
export * from './application/engine/DownloadEngine';
export * from './application/engine/RangeResumeNegotiator';
export * from './application/engine/TransferValidator';
export * from './application/use-cases/DownloadPdfUseCase';
export * from './infrastructure/http/HttpClient';
export * from './infrastructure/storage/LocalFileStorage';
