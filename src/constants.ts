export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'talktype';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';
export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;

// Hotkey
export const DEFAULT_HOTKEY = 'Alt';
export const DEFAULT_ACTIVATION_DELAY_MS = 100;

// Audio capture
export const ALLOWED_RECORDERS = ['sox', 'rec', 'arecord'] as const;
export const DEFAULT_RECORDER = 'arecord';
export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_CHANNELS = 1;

// Live transcription
export const DEEPGRAM_LISTEN_URL = 'wss://api.deepgram.com/v1/listen';
export const DEFAULT_TRANSCRIPTION_MODEL = 'nova-2';
export const DEFAULT_LANGUAGE = 'en-US';
export const DEFAULT_INTERIM_RESULTS = false;
export const CONNECT_TIMEOUT_MS = 10000;
export const CLOSE_TIMEOUT_MS = 3000;
export const NORMAL_CLOSURE_CODE = 1000;

// Synthetic typing
export const DEFAULT_TYPING = true;
export const DEFAULT_TYPE_DELAY_MS = 10;
export const DEFAULT_SETTLE_DELAY_MS = 200;
export const DEFAULT_KEY_DELAY_MS = 50;
export const TYPING_TOOL = 'xdotool';

// Transcription log
export const DEFAULT_LOG_FILE = 'transcriptions.txt';
export const DEFAULT_SAVE_DIRECTORY = './';
export const LOG_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
export const SAVE_FILENAME_TIMESTAMP_FORMAT = 'YYYYMMDD_HHmmss';

export const TALKTYPE_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    configDirectory: DEFAULT_CONFIG_DIR,
    hotkey: DEFAULT_HOTKEY,
    activationDelay: DEFAULT_ACTIVATION_DELAY_MS,
    model: DEFAULT_TRANSCRIPTION_MODEL,
    language: DEFAULT_LANGUAGE,
    sampleRate: DEFAULT_SAMPLE_RATE,
    recorder: DEFAULT_RECORDER,
    interimResults: DEFAULT_INTERIM_RESULTS,
    typing: DEFAULT_TYPING,
    typeDelay: DEFAULT_TYPE_DELAY_MS,
    settleDelay: DEFAULT_SETTLE_DELAY_MS,
    keyDelay: DEFAULT_KEY_DELAY_MS,
    logFile: DEFAULT_LOG_FILE,
    saveDirectory: DEFAULT_SAVE_DIRECTORY,
};
