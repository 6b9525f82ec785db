// Entities
export * from './entities/Playlist';
export * from './entities/DownloadRecord';
export * from './entities/DownloadResult';

// Interfaces
export * from './interfaces/IFetchClient';
export * from './interfaces/IPlaylistParser';
export * from './interfaces/IFileStorage';
export * from './interfaces/IRecordStore';
export * from './interfaces/IProcessRunner';
export * from './interfaces/IVideoTool';

// Value Objects
export * from './value-objects/TargetIdentity';
export * from './value-objects/Filename';
