export { createDownloadStream, MemoryDownloadStream } from './download.js';
export { createUploadStream, MemoryUploadStream } from './upload.js';
export { StreamGuard } from './guard.js';
export { HandoffChannel } from './handoff.js';
