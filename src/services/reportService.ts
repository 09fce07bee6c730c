import PDFDocument from "pdfkit";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { formatCurrency, formatFactor, titleCase } from "../modules/format";
import type { ApplicationRecord, RiskProfile, UnderwritingDecision } from "../modules/types";

const RISK_COLORS: Record<RiskProfile, string> = {
  low: "#1e8e3e",
  medium: "#e37400",
  high: "#d93025"
};

type Row = [label: string, value: string];

function heading(doc: PDFKit.PDFDocument, text: string) {
  doc.moveDown(1);
  doc.fontSize(13).font("Helvetica-Bold").fillColor("#000000").text(text);
  doc.fontSize(10).font("Helvetica").moveDown(0.3);
}

function rows(doc: PDFKit.PDFDocument, data: Row[]) {
  for (const [label, value] of data) {
    doc.font("Helvetica-Bold").text(label, { continued: true, indent: 20 });
    doc.font("Helvetica").text(` ${value}`);
  }
}

function bullets(doc: PDFKit.PDFDocument, items: readonly string[], empty: string) {
  if (items.length === 0) {
    doc.text(empty, { indent: 20 });
    return;
  }
  for (const item of items) {
    doc.text(`• ${item}`, { indent: 20 });
  }
}

export function reportFileName(quoteId: string) {
  return `quote_${quoteId}.pdf`;
}

export function renderQuotePdf(
  application: ApplicationRecord,
  decision: UnderwritingDecision
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "LETTER", margin: 72 });
    const chunks: Buffer[] = [];

    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc
      .fontSize(20)
      .font("Helvetica-Bold")
      .text(`Insurance Quote Report for ${application.businessName}`, { align: "center" });
    doc.moveDown(0.5);
    doc.fontSize(10).font("Helvetica").fillColor("#666666");
    doc.text(`Quote ID: ${decision.quoteId}`, { align: "center" });
    doc.text(`Generated On: ${decision.timestamp}`, { align: "center" });
    doc.fillColor("#000000");

    heading(doc, "Quote Details");
    rows(doc, [
      ["Business Name:", application.businessName],
      ["Business Type:", titleCase(application.businessType)],
      ["Annual Revenue:", formatCurrency(application.annualRevenue)],
      ["Employee Count:", String(application.employeeCount)],
      ["Location:", `${application.city}, ${application.state}`],
      ["Years in Business:", String(application.yearsInBusiness)],
      ["Premium Estimate:", formatCurrency(decision.premiumEstimate)]
    ]);

    const { breakdown } = decision;
    heading(doc, "Premium Calculation Breakdown");
    rows(doc, [
      ["Base Rate:", `${formatCurrency(breakdown.baseRate)} per $1,000 (${titleCase(breakdown.rateClass)})`],
      ["Employee Factor:", formatFactor(breakdown.employeeFactor)],
      ["Base Premium:", formatCurrency(breakdown.basePremium)],
      ["Risk Multiplier:", formatFactor(breakdown.riskMultiplier)],
      ["Claims Surcharge:", `${formatCurrency(breakdown.claimsSurcharge)} (${breakdown.claimsInWindow} claims in window)`],
      ["Tenure Factor:", formatFactor(breakdown.tenureFactor)],
      ["Final Premium:", formatCurrency(breakdown.premium)]
    ]);
    if (breakdown.minimumApplied) {
      doc.text("Minimum premium applied.", { indent: 20 });
    }

    heading(doc, "Risk Assessment");
    doc
      .font("Helvetica-Bold")
      .fillColor(RISK_COLORS[decision.riskProfile])
      .text(`Risk Profile: ${decision.riskProfile.toUpperCase()}`, { indent: 20 });
    doc.fillColor("#000000").font("Helvetica");
    if (decision.riskScore !== null) {
      doc.text(`Risk Score: ${decision.riskScore.toFixed(2)}`, { indent: 20 });
    }
    doc.moveDown(0.3);
    bullets(doc, decision.riskFactors, "No specific risk factors identified");

    heading(doc, "Business Description");
    doc.text(application.businessDescription, { indent: 20 });

    heading(doc, "Claims History");
    bullets(
      doc,
      application.claimsHistory.map(
        (claim) => `${claim.date}  ${titleCase(claim.type)}  ${formatCurrency(claim.amount)}`
      ),
      "No previous claims"
    );

    if (decision.conditions.length > 0) {
      heading(doc, "Required Conditions");
      bullets(doc, decision.conditions, "");
    }

    if (application.additionalNotes) {
      heading(doc, "Additional Notes");
      doc.text(application.additionalNotes, { indent: 20 });
    }

    doc.end();
  });
}

export async function writeQuoteReport(
  reportsDir: string,
  application: ApplicationRecord,
  decision: UnderwritingDecision
) {
  await mkdir(reportsDir, { recursive: true });

  const reportPath = path.join(reportsDir, reportFileName(decision.quoteId));
  const pdf = await renderQuotePdf(application, decision);
  await writeFile(reportPath, pdf);

  return reportPath;
}
