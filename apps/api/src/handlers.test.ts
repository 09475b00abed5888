import { describe, it, expect } from "vitest";
import { DocumentLoadError, MissingInputError, NoDocumentsError, ValidationError } from "@core";
import { handleAnalyze, handleStructure, statusFor } from "./handlers";

const ML_TEXT =
  "Trends\nMachine learning trends are reshaping how research teams plan experiments, and recent findings show rapid growth in model sizes.";
const TRAVEL_TEXT =
  "Itinerary\nThe train leaves the central station at nine and arrives at the coast shortly after noon, giving plenty of time for lunch.";

function base64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

describe("handleStructure", () => {
  it("extracts from inline text", async () => {
    expect(await handleStructure({ name: "notes.txt", text: "Welcome to the Spring Challenge\r\nBody" })).toEqual({
      title: "Welcome to the Spring Challenge",
      outline: [],
    });
  });

  it("decodes base64 payloads", async () => {
    expect(await handleStructure({ name: "notes.txt", mime: "text/plain", data_base64: base64("Short") })).toEqual({
      title: "notes",
      outline: [],
    });
  });

  it("requires a payload", async () => {
    await expect(handleStructure({ name: "notes.txt" })).rejects.toBeInstanceOf(ValidationError);
    await expect(handleStructure("nope")).rejects.toBeInstanceOf(ValidationError);
  });

  it("reports unreadable pdfs", async () => {
    await expect(handleStructure({ name: "a.pdf", data_base64: base64("not a pdf") })).rejects.toBeInstanceOf(DocumentLoadError);
  });
});

describe("handleAnalyze", () => {
  const documents = [
    { name: "ml.txt", text: ML_TEXT },
    { name: "travel.txt", data_base64: base64(TRAVEL_TEXT) },
  ];

  it("ranks sections across documents", async () => {
    const out = await handleAnalyze({ persona: "Researcher", job_to_be_done: "understand machine learning trends", documents });
    expect(out.metadata.input_documents).toEqual(["ml.txt", "travel.txt"]);
    expect(out.extracted_sections.map((s) => [s.document, s.section_title, s.importance_rank])).toEqual([
      ["ml.txt", "Trends", 1],
      ["travel.txt", "Itinerary", 2],
    ]);
  });

  it("rejects a blank persona", async () => {
    await expect(handleAnalyze({ persona: " ", job_to_be_done: "x", documents })).rejects.toBeInstanceOf(MissingInputError);
  });

  it("fails when no document can be read", async () => {
    const broken = [{ name: "a.pdf", data_base64: base64("junk") }];
    await expect(handleAnalyze({ persona: "Researcher", job_to_be_done: "x", documents: broken })).rejects.toBeInstanceOf(
      NoDocumentsError
    );
  });
});

describe("statusFor", () => {
  it("maps error codes to http statuses", () => {
    expect(statusFor(new ValidationError("invalid_request", []))).toBe(400);
    expect(statusFor(new MissingInputError("persona"))).toBe(400);
    expect(statusFor(new DocumentLoadError("a.pdf", "bad"))).toBe(400);
    expect(statusFor(new NoDocumentsError(1))).toBe(422);
    expect(statusFor(new ValidationError("invalid_output", []))).toBe(500);
    expect(statusFor(new Error("boom"))).toBe(500);
  });
});
