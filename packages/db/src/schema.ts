export const schemaSql = `
CREATE TABLE IF NOT EXISTS cases (
  id INTEGER PRIMARY KEY,
  urn TEXT NOT NULL,
  finalised INTEGER,
  area_id INTEGER,
  area_name TEXT,
  unit_id INTEGER,
  unit_name TEXT,
  registration_date TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_cases_urn ON cases(urn);

CREATE TABLE IF NOT EXISTS defendants (
  id INTEGER PRIMARY KEY,
  case_id INTEGER NOT NULL,
  dob TEXT,
  gender TEXT,
  ethnicity TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(case_id) REFERENCES cases(id)
);

CREATE TABLE IF NOT EXISTS charges (
  id INTEGER PRIMARY KEY,
  defendant_id INTEGER NOT NULL,
  code TEXT,
  description TEXT,
  latest_verdict TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(defendant_id) REFERENCES defendants(id)
);

CREATE TABLE IF NOT EXISTS offences (
  id INTEGER PRIMARY KEY,
  defendant_id INTEGER NOT NULL,
  code TEXT,
  type TEXT,
  description TEXT,
  active INTEGER,
  created_at TEXT NOT NULL,
  FOREIGN KEY(defendant_id) REFERENCES defendants(id)
);

CREATE TABLE IF NOT EXISTS documents (
  id INTEGER PRIMARY KEY,
  case_id INTEGER NOT NULL,
  original_file_name TEXT,
  cms_doc_category TEXT,
  doc_type TEXT,
  file_extension TEXT,
  mime_type TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(case_id) REFERENCES cases(id)
);

CREATE TABLE IF NOT EXISTS versions (
  id INTEGER PRIMARY KEY,
  document_id INTEGER NOT NULL,
  source_blob_container TEXT,
  source_blob_name TEXT,
  parsed_blob_container TEXT,
  parsed_blob_name TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(document_id) REFERENCES documents(id)
);

CREATE TABLE IF NOT EXISTS experiments (
  id TEXT PRIMARY KEY,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sections (
  id INTEGER PRIMARY KEY,
  version_id INTEGER NOT NULL,
  document_id INTEGER,
  experiment_id TEXT NOT NULL,
  redacted_content TEXT,
  content_blob_container TEXT,
  content_blob_name TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(version_id) REFERENCES versions(id),
  FOREIGN KEY(document_id) REFERENCES documents(id),
  FOREIGN KEY(experiment_id) REFERENCES experiments(id)
);

CREATE TABLE IF NOT EXISTS analysis_jobs (
  id INTEGER PRIMARY KEY,
  section_id INTEGER NOT NULL,
  experiment_id TEXT NOT NULL,
  task_ids TEXT NOT NULL,
  created_at TEXT NOT NULL,
  FOREIGN KEY(section_id) REFERENCES sections(id),
  FOREIGN KEY(experiment_id) REFERENCES experiments(id)
);

CREATE TABLE IF NOT EXISTS prompt_templates (
  id INTEGER PRIMARY KEY,
  name TEXT,
  agent TEXT,
  theme TEXT,
  pattern TEXT,
  version TEXT,
  template TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_prompt_templates_key ON prompt_templates(agent, theme, pattern);

CREATE TABLE IF NOT EXISTS analysis_results (
  id INTEGER PRIMARY KEY,
  analysis_job_id INTEGER NOT NULL,
  experiment_id TEXT NOT NULL,
  prompt_template_id INTEGER,
  theme_id TEXT,
  pattern_id TEXT,
  content TEXT NOT NULL,
  justification TEXT,
  category_id TEXT,
  self_confidence REAL,
  is_witness INTEGER,
  rewritten_phrase TEXT,
  rewritten_explanation TEXT,
  defence_verdict TEXT,
  defence_pattern TEXT,
  defence_argument TEXT,
  reviewer_final_verdict TEXT,
  reviewer_confidence_score REAL,
  reviewer_reasoning TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY(analysis_job_id) REFERENCES analysis_jobs(id),
  FOREIGN KEY(experiment_id) REFERENCES experiments(id),
  FOREIGN KEY(prompt_template_id) REFERENCES prompt_templates(id)
);

CREATE TABLE IF NOT EXISTS events (
  id INTEGER PRIMARY KEY,
  source TEXT,
  event_type TEXT,
  actor_id TEXT,
  action TEXT,
  object_type TEXT,
  object_id TEXT,
  correlation_id TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_correlation ON events(correlation_id);
`;
