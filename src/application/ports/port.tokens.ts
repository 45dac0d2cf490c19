// Injection tokens (string symbols for DI)
export const FILE_STORAGE_PORT = 'FileStoragePort';
export const ARCHIVE_BUILDER_PORT = 'ArchiveBuilderPort';
export const NOTIFIER_PORT = 'NotifierPort';
export const FRAME_SOURCE_PORT = 'FrameSourcePort';
export const DISK_SPACE_PORT = 'DiskSpacePort';
export const EXTRACTION_LIMITS_PORT = 'ExtractionLimitsPort';
