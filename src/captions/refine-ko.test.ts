import { describe, expect, it } from "vitest";
import { buildEndingTable, matchEnding } from "./endings.js";
import { KOREAN_ENDINGS, createKoreanRefiner, koreanRefiner } from "./refine-ko.js";

const refine = (lines: string[]) => koreanRefiner.refine(lines);

describe("koreanRefiner", () => {
  it("closes a question ending with a question mark", () => {
    expect(refine(["이거 정말 맞나요"])).toBe("이거 정말 맞나요?");
  });

  it("closes a statement ending with a period", () => {
    expect(refine(["오늘은", "날씨가 좋습니다"])).toBe("오늘은 날씨가 좋습니다.");
  });

  it("merges lead-up fragments into the sentence their last line ends", () => {
    expect(refine(["제가 어제", "친구를 만나서", "정말 재미있었죠", "내일은 뭐 할까요"])).toBe(
      "제가 어제 친구를 만나서 정말 재미있었죠.\n\n내일은 뭐 할까요?",
    );
  });

  it("classifies by the longest matching ending", () => {
    // 있어요 is a statement; the shorter 어요 it contains is also a question ending.
    expect(refine(["비가 오고 있어요"])).toBe("비가 오고 있어요.");
  });

  it("collapses identical consecutive sentences", () => {
    expect(refine(["좋습니다", "좋습니다"])).toBe("좋습니다.");
  });

  it("keeps identical sentences that are not consecutive", () => {
    expect(refine(["좋습니다", "그렇죠", "좋습니다"])).toBe("좋습니다.\n\n그렇죠.\n\n좋습니다.");
  });

  it("strips stage directions and speaker markers", () => {
    expect(refine(["(웃음)", "[박수] 그렇죠", ">> 네 맞습니다"])).toBe(
      "그렇죠.\n\n네 맞습니다.",
    );
  });

  it("keeps punctuation already present", () => {
    expect(refine(["그게 뭔가요?"])).toBe("그게 뭔가요?");
  });

  it("flushes a trailing fragment with a period", () => {
    expect(refine(["안녕하세요 여러분", "오늘은"])).toBe("안녕하세요 여러분 오늘은.");
  });

  it("returns an empty string when nothing survives filtering", () => {
    expect(refine(["[음악]", "  "])).toBe("");
  });
});

describe("ending table", () => {
  it("is sorted longest first", () => {
    const lengths = KOREAN_ENDINGS.map((e) => e.suffix.length);
    expect(lengths).toEqual([...lengths].sort((a, b) => b - a));
  });

  it("adds punctuation variants per kind", () => {
    const table = buildEndingTable({ question: ["나요"], statement: ["다"] });
    expect(table).toEqual([
      { suffix: "나요.", kind: "question" },
      { suffix: "나요?", kind: "question" },
      { suffix: "다.", kind: "statement" },
      { suffix: "나요", kind: "question" },
      { suffix: "다", kind: "statement" },
    ]);
  });

  it("treats an ending listed under both kinds as a question", () => {
    const table = buildEndingTable({ question: ["어요"], statement: ["어요"] });
    expect(matchEnding(table, "먹어요")?.kind).toBe("question");
  });

  it("prefers a longer statement ending over a shorter question ending", () => {
    const table = buildEndingTable({ question: ["요"], statement: ["세요"] });
    expect(matchEnding(table, "가세요")).toEqual({ suffix: "세요", kind: "statement" });
    expect(matchEnding(table, "가요")).toEqual({ suffix: "요", kind: "question" });
  });

  it("prefers a longer question ending over a shorter statement ending", () => {
    const refiner = createKoreanRefiner(
      buildEndingTable({ question: ["까요"], statement: ["요"] }),
    );
    expect(refiner.refine(["갈까요"])).toBe("갈까요?");
    expect(refiner.refine(["좋아요"])).toBe("좋아요.");
  });

  it("returns null when nothing matches", () => {
    expect(matchEnding(KOREAN_ENDINGS, "여러분")).toBeNull();
  });
});
