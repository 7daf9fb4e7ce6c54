export const QUIZ_CONFIG = {
  // Parsing
  BLOCK_MARKER: '++++',
  SEPARATOR_PREFIXES: ['====', '---', '___'],
  // Listed order breaks ties between markers of equal length
  CORRECT_MARKERS: ['#', '*', '✓', '√', '+', '→', '→→', '>>', '✅', '✔'],
  NARRATIVE_WINDOW: 4, // plain lines kept before a separator

  // Pricing
  BASE_COST: 10000,
  COST_STEP: 5000,

  // Sessions
  FEEDBACK_DELAY_MS: 1500,
  SESSION_CONTEXT_TTL_SECONDS: 86400,
  LOCK_TTL_MS: 5000,
  LOCK_WAIT_MS: 3000,
  LEADERBOARD_SIZE: 10,

  // Events
  EVENTS: {
    // Client to Server
    START_QUIZ: 'start_quiz',
    RESTART_QUIZ: 'restart_quiz',
    SUBMIT_ANSWER: 'submit_answer',
    REQUEST_QUESTION: 'request_question',

    // Server to Client
    QUESTION: 'question',
    ANSWER_FEEDBACK: 'answer_feedback',
    QUIZ_SUMMARY: 'quiz_summary',
    ERROR: 'error',
  },
} as const;
