import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { assert } from "chai";
import { ShaderArchive } from '../src/archive.js';
import { PackagerError, inspectArchive, packArchive, unpackArchive } from '../src/packager.js';

const VSH_COUNT = 64;

function vshName(i: number): string {
  return String(i).padStart(2, '0');
}

function memberData(i: number): Buffer {
  return Buffer.from(`vertex shader ${i}`);
}

function catchPackagerError(fn: () => unknown): PackagerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PackagerError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a PackagerError to be thrown");
}

describe("shpak packager tests", () => {
  let tmpDir = "";

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shpak-packager-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeMemberFiles(prefix: string, count: number): void {
    fs.mkdirSync(prefix, { recursive: true });
    for (let i = 0; i < count; i++) {
      fs.writeFileSync(`${prefix}${vshName(i)}.vsh`, memberData(i));
    }
  }

  function writeArchive(file: string, count: number): void {
    const archive = new ShaderArchive();
    archive.assemble(Array.from({ length: count }, (_, i) => memberData(i)));
    archive.flushToFile(file);
  }

  it("packing and unpacking vertex shaders should give back the member files", () => {
    const source = path.join(tmpDir, 'vsh') + path.sep;
    const target = path.join(tmpDir, 'out') + path.sep;
    const file = path.join(tmpDir, 'vertex_shaders.enc');
    writeMemberFiles(source, VSH_COUNT);

    const packed = packArchive({ client: 'pc', type: 'vsh', file, prefix: source });

    let expectedBytes = 33;
    for (let i = 0; i < VSH_COUNT; i++) {
      expectedBytes += 4 + memberData(i).length;
    }
    assert.deepEqual(packed, { members: VSH_COUNT, bytes: expectedBytes });
    assert.strictEqual(fs.statSync(file).size, expectedBytes);

    const unpacked = unpackArchive({ client: 'pc', type: 'vsh', file, prefix: target });

    assert.deepEqual(unpacked, { written: VSH_COUNT, extra: false });
    for (let i = 0; i < VSH_COUNT; i++) {
      const data = fs.readFileSync(`${target}${vshName(i)}.vsh`);
      assert.equal(Buffer.compare(data, memberData(i)), 0, `member ${i}`);
    }
  });

  it("a missing member file should fail packing", () => {
    const source = path.join(tmpDir, 'vsh') + path.sep;
    writeMemberFiles(source, VSH_COUNT - 1);

    const err = catchPackagerError(() => packArchive({
      client: 'pc', type: 'vsh', file: path.join(tmpDir, 'out.enc'), prefix: source,
    }));

    assert.strictEqual(err.message, "failed to read member file");
    assert.isFalse(fs.existsSync(path.join(tmpDir, 'out.enc')));
  });

  it("an unwritable archive should fail packing", () => {
    const source = path.join(tmpDir, 'vsh') + path.sep;
    writeMemberFiles(source, VSH_COUNT);

    const err = catchPackagerError(() => packArchive({
      client: 'pc', type: 'vsh', file: path.join(tmpDir, 'missing', 'out.enc'), prefix: source,
    }));

    assert.strictEqual(err.message, "could not open output file for writing");
  });

  it("a missing archive should fail unpacking", () => {
    const err = catchPackagerError(() => unpackArchive({
      client: 'pc', type: 'vsh', file: path.join(tmpDir, 'missing.enc'), prefix: tmpDir + path.sep,
    }));

    assert.strictEqual(err.message, "could not open file");
  });

  it("a corrupt archive should fail unpacking", () => {
    const file = path.join(tmpDir, 'corrupt.enc');
    fs.writeFileSync(file, Buffer.alloc(64, 0x55));

    const err = catchPackagerError(() => unpackArchive({
      client: 'pc', type: 'vsh', file, prefix: tmpDir + path.sep,
    }));

    assert.strictEqual(err.message, "archive is corrupt");
  });

  it("members beyond the names table should be skipped", () => {
    const file = path.join(tmpDir, 'vertex_shaders.enc');
    const target = path.join(tmpDir, 'out') + path.sep;
    writeArchive(file, VSH_COUNT + 1);

    const unpacked = unpackArchive({ client: 'pc', type: 'vsh', file, prefix: target });

    assert.deepEqual(unpacked, { written: VSH_COUNT, extra: true });
    assert.isTrue(fs.existsSync(`${target}63.vsh`));
    assert.isFalse(fs.existsSync(`${target}64.vsh`));
  });

  it("too few members should fail unpacking", () => {
    const file = path.join(tmpDir, 'vertex_shaders.enc');
    writeArchive(file, 3);

    const err = catchPackagerError(() => unpackArchive({
      client: 'pc', type: 'vsh', file, prefix: path.join(tmpDir, 'out') + path.sep,
    }));

    assert.strictEqual(err.message, "loaded archive has missing members (3 of 64)");
  });

  it("a names file should name the unpacked members", () => {
    const file = path.join(tmpDir, 'vertex_shaders.enc');
    const namesFile = path.join(tmpDir, 'names.txt');
    const target = path.join(tmpDir, 'named_');
    writeArchive(file, VSH_COUNT);
    fs.writeFileSync(namesFile, Array.from({ length: VSH_COUNT }, (_, i) => `shader_${i}`).join("\n"));

    unpackArchive({ client: 'ce', type: 'vsh', file, prefix: target, namesFile });

    assert.equal(Buffer.compare(fs.readFileSync(`${target}shader_5.vsh`), memberData(5)), 0);
  });

  it("inspectArchive should list member sizes", () => {
    const file = path.join(tmpDir, 'vertex_shaders.enc');
    writeArchive(file, 3);

    assert.deepEqual(inspectArchive(file), [
      memberData(0).length,
      memberData(1).length,
      memberData(2).length,
    ]);
  });
});
