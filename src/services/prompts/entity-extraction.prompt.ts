/**
 * Prompt asking the model for one JSON object describing the organisation behind a page.
 * Requirements per entity type mirror REQUIRED_FIELDS_BY_TYPE in types/entity.ts.
 */
export function buildEntityExtractionPrompt(websiteText: string, url: string): string {
  return `
Extract the following details from the website content below. Return ONLY valid JSON format:

Required Fields:
- name: (string) Official company name
- slug: (string) URL-friendly version of the company name
- entity_type: (string) 'social_enterprise', 'investor', 'ecosystem_builder'
- website: (string) Main website URL
- description: (string) Brief description of the company
- hq_location: (string) location
- contact_email: (string) Contact email address
- industry_sector: (string) Primary industry or sector, required if entity_type is 'social_enterprise'
- social_status: (string) 'Yes', 'No', or 'Unknown', required if entity_type is 'social_enterprise'
- funding_stage: (string) 'Growth', 'Pre-seed', 'Seed', 'Series A', etc., required if entity_type is 'social_enterprise'
- cheque_size_range: (string) Range of investment amounts, required if entity_type is 'investor'
- investment_thesis: (string) Brief description of investment focus, required if entity_type is 'investor'
- program_type: (string) 'Accelerator', 'Incubator', 'Grant', etc., required if entity_type is 'ecosystem_builder'
- next_intake_date: (string) Next application deadline or intake date, required if entity_type is 'ecosystem_builder'
- impact: (string) Brief description of social/environmental impact, required if entity_type is 'social_enterprise'
- problem_solved: (string) Description of the problem being addressed, required if entity_type is 'social_enterprise'
- target_beneficiaries: (string) Who benefits from the company's work, required if entity_type is 'social_enterprise'
- revenue_model: (string) How the company generates revenue, required if entity_type is 'social_enterprise'
- year_founded: (string) Year the company was founded, required if entity_type is 'social_enterprise'
- awards: (string) Any awards or recognitions received, required if entity_type is 'social_enterprise'
- grants: (string) Any grants received, required if entity_type is 'social_enterprise'
- institutional_support: (string) Any institutional support received, required if entity_type is 'social_enterprise'

Important:
- Use "Unknown" for missing information
- Keep description concise (1-2 sentences)
- For website, use "${url}" if not found in content

Example Output:
{
  "name": "Harbour Bakery Collective",
  "slug": "harbour-bakery-collective",
  "entity_type": "social_enterprise",
  "website": "https://harbour-bakery.example.org",
  "description": "Community bakery training and employing young people leaving care.",
  "hq_location": "Leeds, United Kingdom",
  "contact_email": "hello@harbour-bakery.example.org",
  "industry_sector": "Food & Beverage",
  "social_status": "Yes",
  "funding_stage": "Seed",
  "cheque_size_range": "Unknown",
  "investment_thesis": "Unknown",
  "program_type": "Unknown",
  "next_intake_date": "Unknown",
  "impact": "Paid apprenticeships for care leavers",
  "problem_solved": "Youth unemployment among care leavers",
  "target_beneficiaries": "Young people aged 16-25 leaving care",
  "revenue_model": "Wholesale and cafe sales",
  "year_founded": "2018",
  "awards": "Unknown",
  "grants": "Unknown",
  "institutional_support": "Unknown"
}

Website Content:
${websiteText}
`;
}
