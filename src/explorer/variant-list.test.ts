import { join } from "path";
import { writeFileSync } from "fs";
import { loadLayerSpec, loadVariantList, parseLayerSpec, parseVariantList } from "./variant-list.js";
import { ParseError } from "../errors.js";
import { makeTempDir, removeTempDirs } from "../testing/fixtures.js";

afterEach(removeTempDirs);

describe("parseVariantList", () => {
  it("reads one implementation per line and skips blank lines", () => {
    const text = [
      '{"name": "r1_o4", "dir": "impls/r1_o4", "ochan_scale_factor": 4}',
      "",
      '{"name": "r2_o8", "dir": "impls/r2_o8", "ochan_scale_factor": 8, "read_scale_factor": 2}',
      "",
    ].join("\n");

    expect(parseVariantList(text, "impls.txt")).toEqual([
      { name: "r1_o4", dir: "impls/r1_o4", ochanScaleFactor: 4 },
      { name: "r2_o8", dir: "impls/r2_o8", ochanScaleFactor: 8, readScaleFactor: 2 },
    ]);
  });

  it("fails the whole list on a line that is not JSON", () => {
    const text = '{"name": "r1_o4", "dir": "a", "ochan_scale_factor": 4}\n{name: r2}\n';
    expect(() => parseVariantList(text, "impls.txt")).toThrow(ParseError);
    expect(() => parseVariantList(text, "impls.txt")).toThrow(/^Invalid JSON at impls.txt:2: /);
  });

  it("names the missing field", () => {
    const text = '{"name": "r1_o4", "dir": "a"}';
    expect(() => parseVariantList(text, "impls.txt")).toThrow(
      "Invalid implementation at impls.txt:1: ochan_scale_factor: Required"
    );
  });

  it("rejects a zero scale factor", () => {
    const text = '{"name": "r1_o4", "dir": "a", "ochan_scale_factor": 0}';
    expect(() => parseVariantList(text, "impls.txt")).toThrow(ParseError);
  });

  it("loads a list from disk", () => {
    const dir = makeTempDir();
    const path = join(dir, "impls.txt");
    writeFileSync(path, '{"name": "r1_o4", "dir": "a", "ochan_scale_factor": 4}\n');
    expect(loadVariantList(path)).toHaveLength(1);
  });
});

describe("parseLayerSpec", () => {
  const spec = {
    layer_name: "tdf6",
    output_height: 28,
    output_width: 28,
    output_chans: 32,
    filter_size: 1,
    input_chans: 128,
  };

  it("maps the layer definition to a LayerSpec", () => {
    expect(parseLayerSpec(spec, "layer.json")).toEqual({
      layerName: "tdf6",
      outputHeight: 28,
      outputWidth: 28,
      outputChans: 32,
      filterSize: 1,
      inputChans: 128,
    });
  });

  it("rejects non-integer dimensions", () => {
    expect(() => parseLayerSpec({ ...spec, output_width: 2.5 }, "layer.json")).toThrow(ParseError);
  });

  it("loads a layer definition from a JSON file", () => {
    const dir = makeTempDir();
    const path = join(dir, "tdf6.json");
    writeFileSync(path, JSON.stringify(spec));
    expect(loadLayerSpec(path).layerName).toBe("tdf6");
  });
});
