/**
 * File storage on the server (`Contents('Blobs')`, `Contents('Files')` on v12).
 * @module services/files
 */

import type { Lookup, RequestExecutor } from '../executor/index.js';
import { formatUrl, verifyVersion } from '../utils/index.js';
import type { ServerInfo } from './types.js';
import { PLAIN_CALL } from './types.js';

/**
 * Service for files stored on the server.
 */
export class FileService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly server: ServerInfo
  ) {}

  /**
   * Path of the contents collection, which moved in v12.
   */
  contentsPath(): string {
    return verifyVersion('12', this.server.version) ? "/Contents('Files')/Contents" : "/Contents('Blobs')/Contents";
  }

  /**
   * Creates a file and uploads its content.
   */
  async create(name: string, content: Buffer | string): Promise<void> {
    await this.executor.post(
      this.contentsPath(),
      { '@odata.type': '#ibm.tm1.api.v1.Document', ID: name, Name: name },
      PLAIN_CALL
    );
    await this.update(name, content);
  }

  /**
   * Replaces the content of an existing file.
   *
   * Servers from 11.8 accept raw bytes; older ones take the content
   * base64-encoded inside the document.
   */
  async update(name: string, content: Buffer | string): Promise<void> {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
    const documentPath = this.documentPath(name);

    if (verifyVersion('11.8', this.server.version)) {
      await this.executor.put(`${documentPath}/Content`, bytes, {
        ...PLAIN_CALL,
        headers: { 'Content-Type': 'application/octet-stream; odata.streaming=true' },
      });
      return;
    }
    await this.executor.patch(documentPath, { Content: bytes.toString('base64') }, PLAIN_CALL);
  }

  /**
   * Downloads a file.
   */
  async get(name: string): Promise<Lookup<Buffer>> {
    const result = await this.executor.lookup(`${this.documentPath(name)}/Content`, PLAIN_CALL);
    return result.found ? { found: true, value: result.value.body } : result;
  }

  async exists(name: string): Promise<boolean> {
    const result = await this.executor.lookup(`${this.documentPath(name)}?$select=ID`, PLAIN_CALL);
    return result.found;
  }

  async delete(name: string): Promise<void> {
    await this.executor.delete(this.documentPath(name), PLAIN_CALL);
  }

  private documentPath(name: string): string {
    return `${this.contentsPath()}${formatUrl("('{}')", name)}`;
  }
}
