import { normalizeDate } from "../src/dates";

describe("normalizeDate", () => {
  it("should keep full dates", () => {
    expect(normalizeDate("2020-05-07")).toBe("2020-05-07");
  });

  it("should zero-pad single digit months and days", () => {
    expect(normalizeDate("2020-5-7")).toBe("2020-05-07");
  });

  it("should default the day of year-month dates to the first", () => {
    expect(normalizeDate("2020-05")).toBe("2020-05-01");
    expect(normalizeDate("05/2020")).toBe("2020-05-01");
    expect(normalizeDate("5/2020")).toBe("2020-05-01");
  });

  it("should default bare years to January first", () => {
    expect(normalizeDate("2020")).toBe("2020-01-01");
  });

  it("should return null for empty input", () => {
    expect(normalizeDate("")).toBeNull();
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate(undefined)).toBeNull();
  });

  it("should return null for shapes it does not know", () => {
    expect(normalizeDate("May 2020")).toBeNull();
    expect(normalizeDate("2020/05/07")).toBeNull();
    expect(normalizeDate("07.05.2020")).toBeNull();
    expect(normalizeDate(" 2020")).toBeNull();
  });

  it("should reject impossible calendar dates", () => {
    expect(normalizeDate("2020-13")).toBeNull();
    expect(normalizeDate("13/2020")).toBeNull();
    expect(normalizeDate("2020-04-31")).toBeNull();
    expect(normalizeDate("2020-00-10")).toBeNull();
  });

  it("should accept February 29 only in leap years", () => {
    expect(normalizeDate("2020-02-29")).toBe("2020-02-29");
    expect(normalizeDate("2000-02-29")).toBe("2000-02-29");
    expect(normalizeDate("2021-02-29")).toBeNull();
    expect(normalizeDate("1900-02-29")).toBeNull();
  });
});
