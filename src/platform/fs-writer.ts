import fs from "fs";
import path from "path";
import type { GeneratedFile } from "./project-files";

export interface ArtifactWriter {
  write(files: readonly GeneratedFile[]): void;
  remove(paths: readonly string[]): void;
}

export class FsArtifactWriter implements ArtifactWriter {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  write(files: readonly GeneratedFile[]): void {
    for (const file of files) {
      const target = this.resolve(file.path);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      if (file.append) {
        fs.appendFileSync(target, file.contents, "utf8");
      } else {
        fs.writeFileSync(target, file.contents, "utf8");
      }
    }
  }

  remove(paths: readonly string[]): void {
    for (const p of paths) {
      fs.rmSync(this.resolve(p), { force: true });
    }
  }

  private resolve(relative: string): string {
    const target = path.resolve(this.root, relative);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new Error(`Refusing to write outside project root: ${relative}`);
    }
    return target;
  }
}
