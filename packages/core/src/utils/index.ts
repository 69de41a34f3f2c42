export {
  pathExists,
  isDirectory,
  readDirSorted,
  isErrnoException,
  tempSiblingPath,
  replaceFileAtomic,
  writeFileAtomic,
  resolveInside,
  withScratchDir,
  containsPath,
} from './fs_helpers';
