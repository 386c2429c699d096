import type { TaskLabel } from '../tasks/labels';

export const SYSTEM_PROMPT = `You are an experienced career coach and technical recruiter.
Answer in well-structured markdown with clear headings and bullet points.
Base every statement on the resume and job description you are given; do not invent experience the candidate does not have.`;

export const ANALYSIS_PROMPT = `Analyze the resume against the job description. Structure your response as follows:

## Resume Analysis Report

### Executive Summary
Two or three sentences on overall alignment with the role.

### Strengths
Bullet points naming the candidate's strongest matching skills and experiences.

### Gaps
Bullet points naming missing or weak requirements.

### Ratings
Rate technical skills, experience relevance and presentation from 1 to 10, one line each.

### Recommendations
Three to five concrete, prioritized next steps.`;

export const INTERVIEW_PROMPT = `Generate exactly 5 technical interview questions based on the skills, tools and experience in the resume. Structure your response as follows:

## Technical Interview Preparation Guide

For each question:
### Question N: <question>
- **What the interviewer is looking for:** one or two sentences.
- **Answer guidance:** the key points a strong answer covers.
- **Example response:** a short first-person answer at the expected level of detail.

Only technical questions; no behavioral questions.`;

export const SUGGESTIONS_PROMPT = `Provide resume improvement suggestions for this job description. Structure your response as follows:

## Resume Optimization Guide

### High-Priority Changes
Bullet points with the changes that most improve the match.

### Keywords to Add
Bullet points with terms from the job description missing from the resume.

### Rewrites
Before/after pairs for two or three resume lines.

### Checklist
A short checklist the candidate can follow.`;

export const JOB_FIT_PROMPT = `Evaluate how well the candidate fits the job. Structure your response as follows:

## Job Fit Assessment Report

### Requirement Match
Bullet points comparing each key requirement with the candidate's evidence.

### Competitive Position
Two or three sentences on how the candidate compares with a typical applicant.

### Recommendation
One of: strong fit, possible fit, weak fit, with a one-sentence reason.

End with a line of the exact form:
**Job Fit Score: <0-100>**`;

export const TASK_PROMPTS: Record<TaskLabel, string> = {
  analysis: ANALYSIS_PROMPT,
  interview: INTERVIEW_PROMPT,
  suggestions: SUGGESTIONS_PROMPT,
  job_fit: JOB_FIT_PROMPT,
};

export type PromptContext = {
  resumeText: string;
  jobDescription: string;
  query: string;
};

export const buildUserPrompt = (task: TaskLabel, { resumeText, jobDescription, query }: PromptContext): string =>
  [
    `## Candidate question\n${query.trim() || '(none)'}`,
    `## Job description\n${jobDescription.trim()}`,
    `## Resume\n${resumeText.trim()}`,
    `## Task\n${TASK_PROMPTS[task]}`,
  ].join('\n\n');

export const NARRATION_SYSTEM_PROMPT = `You are a friendly career coach recording a short voice note for a candidate.
Speak in plain conversational English: no markdown, lists, headings, brackets or emoji.
Stay under 180 words. Cover the main strength, one thing to improve and an overall takeaway.
Work from the analysis you are given without reading it out verbatim.`;

export type NarrationContext = {
  analysis: string;
  query: string;
  userName?: string;
};

export const buildNarrationPrompt = ({ analysis, query, userName }: NarrationContext): string =>
  [
    `## Candidate question\n${query.trim()}`,
    userName ? `## Candidate name\nGreet the candidate as ${userName} once, at the start.` : null,
    `## Analysis\n${analysis.trim()}`,
    '## Task\nReturn only the spoken script.',
  ]
    .filter((section): section is string => section !== null)
    .join('\n\n');
