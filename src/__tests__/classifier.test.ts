import { describe, it, expect } from "vitest";
import {
  absent,
  classifyTitle,
  identifyAssetType,
  identifySession,
  identifyYear,
  isExcludedTitle,
  present,
} from "../classifier.js";
import { testConfig } from "./helpers.js";

const { sessionKeywords, typeKeywords } = testConfig().classification;

describe("identifyYear", () => {
  it("extracts the first 19xx or 20xx token", () => {
    expect(identifyYear("Examen national 2019 session normale")).toEqual(present("2019"));
    expect(identifyYear("Bac 1998 sujet")).toEqual(present("1998"));
  });

  it("keeps the first year when a title lists several", () => {
    expect(identifyYear("Examens 2017-2018 corrigés")).toEqual(present("2017"));
  });

  it("matches inside longer digit runs", () => {
    expect(identifyYear("ref 120215")).toEqual(present("2021"));
  });

  it("is absent when no year-like token exists", () => {
    expect(identifyYear("Examen national session normale")).toEqual(absent);
    expect(identifyYear("Sujet 1850")).toEqual(absent);
  });
});

describe("identifySession", () => {
  it("recognises regular-session synonyms case-insensitively", () => {
    expect(identifySession("Session NORMALE 2020", sessionKeywords)).toEqual(present("Normale"));
    expect(identifySession("session principale", sessionKeywords)).toEqual(present("Normale"));
  });

  it("recognises retake synonyms", () => {
    expect(identifySession("Examen 2020 Rattrapage", sessionKeywords)).toEqual(present("Rattrapage"));
    expect(identifySession("Session extraordinaire", sessionKeywords)).toEqual(present("Rattrapage"));
  });

  it("consults the regular set first when both appear", () => {
    expect(identifySession("Normale et rattrapage 2020", sessionKeywords)).toEqual(present("Normale"));
  });

  it("is absent without keywords", () => {
    expect(identifySession("Examen 2020", sessionKeywords)).toEqual(absent);
  });
});

describe("identifyAssetType", () => {
  it("classifies corrections before exams", () => {
    expect(identifyAssetType("Examen national 2020 - Corrigé", typeKeywords)).toEqual(present("Correction"));
  });

  it("classifies exam papers", () => {
    expect(identifyAssetType("Sujet 2020 normale", typeKeywords)).toEqual(present("MainExam"));
    expect(identifyAssetType("EXAMEN NATIONAL 2020", typeKeywords)).toEqual(present("MainExam"));
  });

  it("is absent for unrelated titles", () => {
    expect(identifyAssetType("Cours de mathématiques", typeKeywords)).toEqual(absent);
  });
});

describe("isExcludedTitle", () => {
  it("filters drill sheets regardless of accents and case", () => {
    expect(isExcludedTitle("Préparation examen 2020", ["préparation", "preparation"])).toBe(true);
    expect(isExcludedTitle("PREPARATION au bac", ["préparation", "preparation"])).toBe(true);
    expect(isExcludedTitle("Examen 2020", ["préparation", "preparation"])).toBe(false);
  });
});

describe("classifyTitle", () => {
  it("reports every facet of a title", () => {
    expect(classifyTitle("Examen National 2016 Rattrapage Corrigé", testConfig())).toEqual({
      excluded: false,
      year: "2016",
      session: "Rattrapage",
      assetType: "Correction",
    });
  });

  it("uses null for unclassified facets", () => {
    expect(classifyTitle("Préparation", testConfig())).toEqual({
      excluded: true,
      year: null,
      session: null,
      assetType: null,
    });
  });
});
