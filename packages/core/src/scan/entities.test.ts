import { describe, it, expect } from "vitest";
import {
  buildEntityDir,
  classifyFile,
  parseFileName,
  parseSessionDir,
  parseSubjectDir,
  splitExtension,
} from "./entities.js";
import { TEST_SCHEMA } from "../test-utils/dataset.js";

describe("parseSubjectDir / parseSessionDir", () => {
  it("strips the entity prefix", () => {
    expect(parseSubjectDir("sub-M2001")).toBe("M2001");
    expect(parseSessionDir("ses-1")).toBe("1");
  });

  it("rejects other names", () => {
    expect(parseSubjectDir("derivatives")).toBeNull();
    expect(parseSubjectDir("sub-")).toBeNull();
    expect(parseSubjectDir("sub-01_extra")).toBeNull();
    expect(parseSessionDir("anat")).toBeNull();
  });
});

describe("splitExtension", () => {
  it("keeps compound extensions together", () => {
    expect(splitExtension("sub-01_T1w.nii.gz")).toEqual({
      stem: "sub-01_T1w",
      extension: ".nii.gz",
    });
  });

  it("returns an empty extension when there is none", () => {
    expect(splitExtension("README")).toEqual({ stem: "README", extension: "" });
    expect(splitExtension(".hidden")).toEqual({ stem: ".hidden", extension: "" });
  });
});

describe("parseFileName", () => {
  it("splits entities, suffix and extension", () => {
    expect(parseFileName("sub-01_ses-2_run-1_bold.nii.gz")).toEqual({
      entities: [
        ["sub", "01"],
        ["ses", "2"],
        ["run", "1"],
      ],
      suffix: "bold",
      extension: ".nii.gz",
    });
  });

  it("returns null for malformed entities", () => {
    expect(parseFileName("sub_01_T1w.nii.gz")).toBeNull();
    expect(parseFileName("sub-01_T1w-x.nii.gz")).toBeNull();
  });
});

describe("classifyFile", () => {
  it("matches datatype, suffix and extension", () => {
    expect(classifyFile(TEST_SCHEMA, "anat", "sub-01_T1w.nii")?.label).toBe("T1w");
    expect(classifyFile(TEST_SCHEMA, "func", "sub-01_task-rest_bold.nii.gz")?.label).toBe(
      "bold",
    );
  });

  it("ignores sidecars and mismatched datatypes", () => {
    expect(classifyFile(TEST_SCHEMA, "anat", "sub-01_T1w.json")).toBeUndefined();
    expect(classifyFile(TEST_SCHEMA, "func", "sub-01_T1w.nii.gz")).toBeUndefined();
    expect(classifyFile(TEST_SCHEMA, "anat", "sub-01_FLAIR.nii")).toBeUndefined();
  });
});

describe("buildEntityDir", () => {
  it("includes the session directory when present", () => {
    expect(buildEntityDir("01", "2", "anat")).toBe("sub-01/ses-2/anat/");
    expect(buildEntityDir("01", null, "dwi")).toBe("sub-01/dwi/");
  });
});
