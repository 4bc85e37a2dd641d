import { Lead } from "../types/lead";

const CSV_HEADER = [
  "Company Name",
  "Industry",
  "Description",
  "Source URL",
  "Company Size",
  "Lead Score",
  "Status",
  "Created At",
];

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render leads as CSV (CRLF line endings, header row first)
 */
export function leadsToCsv(leads: Lead[]): string {
  const lines = [CSV_HEADER.map(escapeCsvField).join(",")];

  for (const lead of leads) {
    lines.push(
      [
        lead.company_name,
        lead.industry,
        lead.description,
        lead.source_url,
        lead.company_size,
        lead.lead_score,
        lead.status,
        lead.created_at,
      ]
        .map(escapeCsvField)
        .join(",")
    );
  }

  return lines.join("\r\n") + "\r\n";
}
