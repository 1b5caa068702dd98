export { FileListerError } from './file_lister';
export type {
  FileLister,
  FileListerErrorCode,
  FileListOptions,
  FsFileListerOptions,
  MemoryFileListerOptions,
} from './file_lister';
export { FsFileLister } from './fs/fs_file_lister';
export { MemoryFileLister } from './memory/memory_file_lister';
