import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { promises as fs } from "fs";
import path from "path";

import { checkParams, validateParams } from "../src/config/params.js";
import type { LoadedPipelineConfig } from "../src/config/pipelineConfig.js";
import { ValidationError } from "../src/core/errors.js";
import { makeTempDir, writeInputs, writeTestConfig } from "./helpers.js";

describe("parameter validation", () => {
  let tmpDir: string;
  let loaded: LoadedPipelineConfig;
  let inputs: { input_vcf: string; input_hpo: string; reference_directory: string };

  beforeAll(async () => {
    tmpDir = await makeTempDir();
    loaded = await writeTestConfig(tmpDir);
    inputs = await writeInputs(tmpDir);
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("resolves a complete parameter set with defaults", async () => {
    const params = await validateParams({ ...inputs, reference_version: "hg38", run_id: "case-1" }, loaded.config);
    expect(params).toEqual({
      runId: "case-1",
      inputVcf: inputs.input_vcf,
      inputHpo: inputs.input_hpo,
      referenceDirectory: inputs.reference_directory,
      referenceVersion: "hg38",
      outputDirectory: path.join(tmpDir, "results", "case-1"),
      chromosomeMap: path.join(tmpDir, "chromosome_map.tsv")
    });
  });

  it("generates a run id when none is given", async () => {
    const params = await validateParams({ ...inputs, reference_version: "hg19" }, loaded.config);
    expect(params.runId).toMatch(/^run_[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it("names the missing parameter", async () => {
    const { input_vcf: _omitted, ...rest } = inputs;
    let caught: unknown;
    try {
      await validateParams({ ...rest, reference_version: "hg19" }, loaded.config);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.parameter).toBe("input_vcf");
    expect(caught.reason).toBe("input_vcf is required");
  });

  it("rejects an unsupported reference version", async () => {
    const { issues, params } = await checkParams({ ...inputs, reference_version: "hg37" }, loaded.config);
    expect(params).toBeNull();
    expect(issues).toEqual([{ parameter: "reference_version", reason: "must be one of hg19, hg38" }]);
  });

  it("reports every problem in parameter order", async () => {
    const hpoWithoutTerms = path.join(tmpDir, "empty.hpo");
    await fs.writeFile(hpoWithoutTerms, "seizures\n");
    const missingVcf = path.join(tmpDir, "absent.vcf");

    const { issues } = await checkParams(
      {
        input_vcf: missingVcf,
        input_hpo: hpoWithoutTerms,
        reference_directory: inputs.input_vcf,
        reference_version: "hg38",
        run_id: "../escape"
      },
      loaded.config
    );
    expect(issues).toEqual([
      { parameter: "input_vcf", reason: `path does not exist: ${missingVcf}` },
      { parameter: "input_hpo", reason: "no HPO terms (HP:nnnnnnn) found" },
      { parameter: "reference_directory", reason: `must be a directory, not a file: ${inputs.input_vcf}` },
      { parameter: "run_id", reason: "must match [A-Za-z0-9][A-Za-z0-9_.-]* (max 128 chars)" }
    ]);
  });

  it("checks the file extension before touching the filesystem", async () => {
    const { issues } = await checkParams(
      { ...inputs, input_vcf: path.join(tmpDir, "sample.bam"), reference_version: "hg19" },
      loaded.config
    );
    expect(issues).toEqual([{ parameter: "input_vcf", reason: "must end in .vcf or .vcf.gz" }]);
  });

  it("rejects a phenotype file with the wrong extension", async () => {
    const { issues, params } = await checkParams(
      { ...inputs, input_hpo: path.join(tmpDir, "terms.csv"), reference_version: "hg19" },
      loaded.config
    );
    expect(params).toBeNull();
    expect(issues).toEqual([{ parameter: "input_hpo", reason: "must end in .hpo or .txt" }]);
  });

  it("requires a reference directory", async () => {
    const { reference_directory: _omitted, ...rest } = inputs;
    const { issues } = await checkParams({ ...rest, reference_version: "hg19" }, loaded.config);
    expect(issues).toEqual([{ parameter: "reference_directory", reason: "reference_directory is required" }]);
  });

  it("requires a reference version", async () => {
    let caught: unknown;
    try {
      await validateParams({ ...inputs }, loaded.config);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.parameter).toBe("reference_version");
    expect(caught.reason).toBe("reference_version is required");
  });

  it("rejects an output directory that is a file", async () => {
    const { issues } = await checkParams(
      { ...inputs, reference_version: "hg19", output_directory: inputs.input_hpo },
      loaded.config
    );
    expect(issues).toEqual([{ parameter: "output_directory", reason: `exists and is not a directory: ${inputs.input_hpo}` }]);
  });

  it("rejects a non-string value", async () => {
    const { issues } = await checkParams({ ...inputs, reference_directory: 42, reference_version: "hg19" }, loaded.config);
    expect(issues).toEqual([{ parameter: "reference_directory", reason: "reference_directory must be a string" }]);
  });
});
