// Port: File System
// The subset of file operations the renewal tooling performs

export interface FileStat {
  isFile: boolean;
  isDirectory: boolean;
  mtime: Date;
  mode: number;
}

export interface FileSystemPort {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string, mode?: number): Promise<void>;
  appendFile(filePath: string, content: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
  stat(filePath: string): Promise<FileStat | null>;
  isExecutable(filePath: string): Promise<boolean>;
  readdir(dirPath: string): Promise<string[]>;
  mkdir(dirPath: string): Promise<void>;
  remove(filePath: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  copyDirectory(source: string, destination: string): Promise<void>;
  chmod(filePath: string, mode: number): Promise<void>;
  touch(filePath: string): Promise<void>;
}
