import { describe, expect, it } from "vitest";
import {
  GeminiReceiptExtractor,
  ReceiptParseError,
  createGeminiModel,
  type ReceiptModel,
} from "./gen-ai";

type ModelRequest = Parameters<ReceiptModel["generateContent"]>[0];

const fakeModel = (...responses: Array<string | Error>) => {
  const requests: ModelRequest[] = [];
  const model: ReceiptModel = {
    async generateContent(request) {
      requests.push(request);
      const next = responses.shift();
      if (next instanceof Error) throw next;
      return { response: { text: () => next ?? "" } };
    },
  };
  return { model, requests };
};

describe("GeminiReceiptExtractor", () => {
  it("returns the record the model responds with", async () => {
    const { model, requests } = fakeModel('{"company_name":"Cafe A","total_amount":"12.50"}');
    const extractor = new GeminiReceiptExtractor(model);

    const record = await extractor.extractFields("CAFE A\nTOTAL $12.50", "cafe-a.pdf");

    expect(record).toEqual({ company_name: "Cafe A", total_amount: "12.50" });
    expect(requests).toHaveLength(1);
    expect(requests[0][1]).toBe("CAFE A\nTOTAL $12.50");
  });

  it("takes the first element when the model answers with a list", async () => {
    const { model } = fakeModel('[{"company_name":"Cafe B","total_amount":"3"}]');

    const record = await new GeminiReceiptExtractor(model).extractFields("text", "b.pdf");

    expect(record).toEqual({ company_name: "Cafe B", total_amount: "3" });
  });

  it("rejects responses that are not JSON objects", async () => {
    await expect(
      new GeminiReceiptExtractor(fakeModel("not json").model).extractFields("text", "x.pdf")
    ).rejects.toBeInstanceOf(ReceiptParseError);
    await expect(
      new GeminiReceiptExtractor(fakeModel('"Cafe A"').model).extractFields("text", "y.pdf")
    ).rejects.toThrow("Failed to parse the receipt fields for y.pdf");
    await expect(
      new GeminiReceiptExtractor(fakeModel("[]").model).extractFields("text", "z.pdf")
    ).rejects.toBeInstanceOf(ReceiptParseError);
  });

  it("retries failed model calls", async () => {
    const { model, requests } = fakeModel(
      new Error("503 Service Unavailable"),
      '{"company_name":"Cafe A","total_amount":"1"}'
    );

    const record = await new GeminiReceiptExtractor(model, {
      retries: 2,
      minTimeout: 0,
    }).extractFields("text", "a.pdf");

    expect(record).toEqual({ company_name: "Cafe A", total_amount: "1" });
    expect(requests).toHaveLength(2);
  });

  it("gives up after the configured retries", async () => {
    const { model, requests } = fakeModel(new Error("quota exceeded"), new Error("quota exceeded"));

    await expect(
      new GeminiReceiptExtractor(model, { retries: 1, minTimeout: 0 }).extractFields("text", "a.pdf")
    ).rejects.toThrow("quota exceeded");
    expect(requests).toHaveLength(2);
  });
});

describe("createGeminiModel", () => {
  it("requires an API key", () => {
    expect(() => createGeminiModel({ apiKey: "", model: "gemini-1.5-flash" })).toThrow(
      /GEMINI_API_KEY is required/
    );
  });

  it("builds a model from explicit credentials", () => {
    const model = createGeminiModel({ apiKey: "test-key", model: "gemini-1.5-flash" });

    expect(typeof model.generateContent).toBe("function");
  });
});
