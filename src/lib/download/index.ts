export * from './download.types';
export * from './parallel.downloader';
