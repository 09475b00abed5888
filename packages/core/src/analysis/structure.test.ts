import { describe, it, expect, vi } from "vitest";
import { doc, page } from "../testing/documents";
import type { DocumentModel } from "../types";
import { extractStructure, processStructureBatch, StructureResult } from "./structure";

const report = doc("report.pdf", [
  page(1, [
    { text: "Quarterly Planning Guide", size: 28, top: 60 },
    { text: "Budget Overview", size: 18, top: 200 },
    { text: "Regional Targets", size: 14, top: 300 },
    { text: "Spending rose in every region during the quarter.", size: 11, top: 400 },
  ]),
]);

describe("extractStructure", () => {
  it("combines the title and the outline", () => {
    expect(extractStructure(report)).toEqual({
      title: "Quarterly Planning Guide",
      outline: [
        { level: "H1", text: "Quarterly Planning Guide", page: 1 },
        { level: "H1", text: "Budget Overview", page: 1 },
        { level: "H3", text: "Regional Targets", page: 1 },
      ],
    });
  });
});

describe("processStructureBatch", () => {
  const inputs = [{ name: "report.pdf" }, { name: "broken.pdf" }];
  const load = async (input: { name: string }): Promise<DocumentModel> => {
    if (input.name === "broken.pdf") throw new Error("bad xref table");
    return report;
  };

  it("skips documents that fail to load", async () => {
    const seen: string[] = [];
    const { results, failures } = await processStructureBatch(inputs, load, async (r: StructureResult) => {
      seen.push(r.name);
    });
    expect(results.map((r) => r.name)).toEqual(["report.pdf"]);
    expect(failures).toEqual([{ name: "broken.pdf", error: "bad xref table" }]);
    expect(seen).toEqual(["report.pdf"]);
  });

  it("aborts when the result handler fails", async () => {
    const onResult = vi.fn(async () => {
      throw new Error("disk full");
    });
    await expect(processStructureBatch([{ name: "report.pdf" }], load, onResult)).rejects.toThrow("disk full");
  });
});
