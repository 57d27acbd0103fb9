/**
 * Static Handler Tests
 */

import path from 'path';
import { directoryPattern, loadStaticFile, resolveSafeFilePath } from '../static-handlers';
import { SetupError } from '../types';
import { makeTempDir, removeTempDir, writeTree } from './helpers';

describe('Static Handlers', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTempDir();
    writeTree(tmp, {
      'page.html': '<html><body>page</body></html>',
      'data.bin': Buffer.from([0x00, 0x01, 0x02, 0x03]),
      'empty.txt': '',
      'dir/': '',
    });
  });

  afterEach(() => {
    removeTempDir(tmp);
  });

  describe('loadStaticFile', () => {
    it('should read the whole file and sniff its type', () => {
      const file = loadStaticFile(path.join(tmp, 'page.html'));

      expect(file.size).toBe(30);
      expect(file.body.toString('utf8')).toBe('<html><body>page</body></html>');
      expect(file.contentType).toBe('text/html; charset=utf-8');
    });

    it('should fall back to octet-stream for binary content', () => {
      expect(loadStaticFile(path.join(tmp, 'data.bin')).contentType).toBe('application/octet-stream');
    });

    it('should prefer a configured content type', () => {
      expect(loadStaticFile(path.join(tmp, 'data.bin'), 'application/x-custom').contentType).toBe('application/x-custom');
    });

    it('should refuse directories and empty files', () => {
      const dir = path.join(tmp, 'dir');
      const empty = path.join(tmp, 'empty.txt');

      expect(() => loadStaticFile(dir)).toThrow(SetupError);
      expect(() => loadStaticFile(dir)).toThrow(`unable to serve document ${dir}: is a directory`);
      expect(() => loadStaticFile(empty)).toThrow(`unable to serve document ${empty}: zero length file`);
    });
  });

  describe('resolveSafeFilePath', () => {
    it('should resolve paths inside the root', () => {
      expect(resolveSafeFilePath('/a/b.txt', tmp)).toBe(path.join(tmp, 'a', 'b.txt'));
      expect(resolveSafeFilePath('', tmp)).toBe(tmp);
    });

    it('should refuse paths escaping the root', () => {
      expect(resolveSafeFilePath('/../outside.txt', tmp)).toBeNull();
      expect(resolveSafeFilePath('a/../../outside.txt', tmp)).toBeNull();
    });
  });

  describe('directoryPattern', () => {
    it('should mount directories as subtrees', () => {
      expect(directoryPattern('/assets')).toBe('/assets/');
      expect(directoryPattern('/assets/')).toBe('/assets/');
    });
  });
});
