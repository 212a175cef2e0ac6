const DEFAULT_PROJECTS = ["project 1", "project 2"] as const;

const STANDARD_QUESTIONS = [
  "Please describe the plan of action for today's field visit.",
  "Please describe the activities carried out to complete the action plan.",
  "What did you observe today that you would like to implement in your next field visit?",
  "What are the key learning outcomes from this field visit?"
] as const;

const SUPPORTED_MEDIA_EXTENSIONS = {
  ".png": "image",
  ".jpg": "image",
  ".jpeg": "image",
  ".mp4": "video",
  ".mov": "video",
  ".avi": "video"
} as const;

type SupportedMediaExtension = keyof typeof SUPPORTED_MEDIA_EXTENSIONS;

const OTHER_PROJECT_VALUE = "__karma_journal_other_project__";

export { DEFAULT_PROJECTS, OTHER_PROJECT_VALUE, STANDARD_QUESTIONS, SUPPORTED_MEDIA_EXTENSIONS };
export type { SupportedMediaExtension };
