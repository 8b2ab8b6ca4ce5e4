import { afterEach, describe, it, expect } from "vitest";
import { cleanup, render, screen } from "@testing-library/react";

import DataBarCell from "../ui/DataBarCell";
import InsightBox from "../ui/InsightBox";
import KPI from "../ui/KPI";
import TrendCell from "../ui/TrendCell";
import SummaryInsight from "../sections/summary/SummaryInsight";
import TopCampaigns from "../sections/summary/TopCampaigns";
import { toCacChartPoints } from "../sections/CustomerSection";
import { ParseWarnings, SchemaErrorPanel } from "../sections/DataIssues";
import { ParseError } from "../../../src/lib/report/errors";
import { UNDEFINED_METRIC, buildMetricSet, ratio } from "../../../src/lib/report/metrics";

afterEach(() => {
  cleanup();
});

describe("InsightBox", () => {
  it("renders its children under the title", () => {
    render(
      <InsightBox title="Notes">
        <p>Spend held steady</p>
      </InsightBox>
    );
    expect(screen.getByText("Notes")).toBeTruthy();
    expect(screen.getByText("Spend held steady")).toBeTruthy();
    expect(screen.queryByText("No insights available.")).toBeNull();
  });

  it("shows a placeholder when empty", () => {
    render(<InsightBox title="Notes" />);
    expect(screen.getByText("No insights available.")).toBeTruthy();
  });
});

describe("KPI", () => {
  it("renders title, value and sub line", () => {
    render(<KPI title="ROAS" value="3.97x" sub="attributed revenue / spend" />);
    expect(screen.getByText("ROAS")).toBeTruthy();
    expect(screen.getByText("3.97x")).toBeTruthy();
    expect(screen.getByText("attributed revenue / spend")).toBeTruthy();
  });
});

describe("TrendCell", () => {
  it("prints a signed percentage", () => {
    const { container } = render(<TrendCell v={0.5} />);
    expect(container.textContent).toBe("▲50.0%");
  });

  it("prints a dash for a missing change", () => {
    const { container } = render(<TrendCell v={null} />);
    expect(container.textContent).toBe("-");
  });
});

describe("DataBarCell", () => {
  it("sizes the bar relative to the max", () => {
    render(<DataBarCell value={25} max={100} label="$25" />);
    expect(screen.getByTestId("data-bar").style.width).toBe("25%");
    expect(screen.getByText("$25")).toBeTruthy();
  });
});

describe("SummaryInsight", () => {
  it("lists insight titles and messages", () => {
    render(
      <SummaryInsight
        title="Key Insights"
        insights={[
          {
            category: "performance",
            title: "Google is the Top Performing Channel",
            message: "Google delivers the highest ROAS at 4.0x",
            metric: "ROAS",
            value: 4,
          },
        ]}
      />
    );
    expect(screen.getByText("Google is the Top Performing Channel")).toBeTruthy();
    expect(screen.getByText("Google delivers the highest ROAS at 4.0x")).toBeTruthy();
  });
});

describe("data issue panels", () => {
  it("names the file and missing columns", () => {
    render(<SchemaErrorPanel schema={{ file: "Google.csv", missing: ["spend", "clicks"] }} message="ignored" />);
    expect(screen.getByText("Google.csv")).toBeTruthy();
    expect(screen.getByText("spend, clicks")).toBeTruthy();
  });

  it("counts skipped rows", () => {
    const errors = [
      new ParseError({ file: "Google.csv", line: 3, column: "spend", raw: "N/A", reason: "expected a non-negative number" }),
      new ParseError({ file: "Google.csv", line: 3, column: "clicks", raw: "?", reason: "expected a non-negative number" }),
    ];
    render(<ParseWarnings errors={errors} />);
    expect(screen.getByText("1 row skipped because of unreadable values")).toBeTruthy();
    expect(screen.getAllByRole("listitem")).toHaveLength(2);
  });
});

describe("TopCampaigns", () => {
  it("lists ranked campaigns with their channel", () => {
    const brand = {
      ...buildMetricSet("Google / Brand", { impressions: 4000, clicks: 160, spend: 120, attributedRevenue: 480, rows: 1 }),
      channel: "Google" as const,
      campaign: "Brand",
    };
    render(<TopCampaigns byRoas={[brand]} byRevenue={[]} />);

    expect(screen.getAllByRole("listitem").map((li) => li.textContent)).toEqual(["1. Brand (Google)4.00x"]);
    expect(screen.getByText("No campaigns in this range.")).toBeTruthy();
  });
});

describe("toCacChartPoints", () => {
  it("breaks the daily line where CAC is undefined", () => {
    const points = toCacChartPoints([
      { date: "2024-01-01", cac: ratio(30, 2), rollingCac: 15 },
      { date: "2024-01-02", cac: UNDEFINED_METRIC, rollingCac: 15 },
    ]);

    expect(points).toEqual([
      { date: "01-01", cac: 15, rollingCac: 15 },
      { date: "01-02", cac: null, rollingCac: 15 },
    ]);
  });
});
