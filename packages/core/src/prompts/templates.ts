import { PromptTemplate } from './PromptTemplate';

export type MatchPromptSlot = 'cv' | 'job' | 'nonce';
export type LocationPromptSlot = 'metadataLocation' | 'gazetteerNote' | 'excerptLength' | 'excerpt';

export const MATCH_EVALUATION_PROMPT = new PromptTemplate<MatchPromptSlot>(
  'match-evaluation',
  ['cv', 'job', 'nonce'],
  `Please read section 1 and follow the instructions.
# 1. Instructions
!!! Do not generate any output until you reach section 1.2. !!!

## 1.1. Analysis and preparation
You are an expert job application assistant.
Review the CV in section 2.1 and the role description in section 2.2. They contain all the information you need.

### 1.1.1. Compare the role requirements carefully with the evidence in the CV and determine the CV-to-role match level:
- **Low match:** the CV does not state direct experience in any key requirement of the role (e.g. a specific technology, industry or critical skill explicitly required). THIS RULE IS ALWAYS VALID!
- **Moderate match:** there are gaps in secondary requirements.
- **Good match:** there are only minor gaps and the candidate should apply.

### 1.1.2. Assess domain knowledge
Write a short **Domain knowledge assessment** naming the industry or domain expertise the role requires and whether the CV demonstrates it. Name every gap explicitly.

### 1.1.3. Based on the match level, take ONE of the following actions:
- if the match level is good, draft one concise paragraph (**Application narrative**) explaining why the candidate may be a good fit. Do NOT draft a full cover letter.
- in all other cases draft a short log entry (**No-go rationale**) starting with "I have compared my CV and the role description and decided not to apply due to the following reasons:"

## 1.2. Generate output
Output ONLY the elements below. Do NOT add anything else.

**CV-to-role match:** [Low match/Moderate match/Good match]
**Domain knowledge assessment:** [assessment]
**Application narrative:** [if the match level is good]
**No-go rationale:** [in all other cases]

# 2. Input

## 2.1. CV:
{cv}

## 2.2. Role Description:
{job}

# Internal: {nonce}
`
);

export const LOCATION_ADJUDICATION_PROMPT = new PromptTemplate<LocationPromptSlot>(
  'location-adjudication',
  ['metadataLocation', 'gazetteerNote', 'excerptLength', 'excerpt'],
  `You are a location validation specialist. A gazetteer lookup found an ambiguous case that needs expert review.

METADATA LOCATION: {metadataLocation}
GAZETTEER ANALYSIS: {gazetteerNote}

JOB DESCRIPTION (first {excerptLength} characters):
{excerpt}

INSTRUCTIONS:
1. Only report CONFLICT if the description clearly names a different work city or country than the metadata location
2. Spelling or language variants of the same city are NO CONFLICT (Frankfurt vs Frankfurt am Main, Munich vs München)
3. If the metadata location is mentioned anywhere as a work location, report NO CONFLICT
4. Quote the location exactly as written in the description and name it in your reasoning
5. If unsure, report NO CONFLICT

FORMAT:
CONFLICT: [YES/NO]
LOCATION: [Authoritative work location]
REASONING: [Brief explanation]
`
);
