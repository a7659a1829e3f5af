/**
 * Global constants for the crawler
 */

/**
 * URL substrings excluded from the frontier by default
 */
export const DEFAULT_IGNORE_PATTERNS = [
  'login',
  'logout',
  'register',
  'newsletter',
  'redirect',
  'wp-json',
  'feed',
  'trackback',
  'xmlrpc',
  'search',
  'page=',
  'paged=',
  'sort=',
  'filter=',
  'cart',
  'checkout',
];

/**
 * Elements that never carry prose
 */
export const REMOVE_SELECTORS = [
  'script',
  'style',
  'meta',
  'link',
  'noscript',
  'svg',
  'iframe',
  'object',
  'embed',
  'nav',
  'header',
  'footer',
  'aside',
];

/**
 * Tables are treated as schedules/timetables and dropped whole
 */
export const TABLE_SELECTORS = ['table', 'thead', 'tbody', 'tfoot', 'tr', 'td', 'th', 'caption'];

/**
 * Containers whose class or id contains one of these are removed
 */
export const NOISE_CONTAINER_SELECTORS = ['div', 'section'];

export const NOISE_CLASS_WORDS = [
  'schedule',
  'timetable',
  'kursplan',
  'course',
  'zeitplan',
  'booking',
  'calendar',
  'datepicker',
  'event',
  'kalender',
  'termin',
  'buchen',
  'reservation',
  'availability',
];

/**
 * Line filters. Fixed heuristics, not configuration.
 */
export const MAX_COLONS_PER_LINE = 5;
export const MAX_DATES_PER_LINE = 5;
export const MAX_WEEKDAYS_PER_LINE = 3;
export const DATE_PATTERN = /\d{1,2}\.\d{1,2}/g;
export const WEEKDAY_TOKENS = [
  'mon',
  'tue',
  'wed',
  'thu',
  'fri',
  'sat',
  'sun',
  'montag',
  'dienstag',
  'mittwoch',
  'donnerstag',
  'freitag',
  'samstag',
  'sonntag',
];

/**
 * Content thresholds
 */
export const MIN_CONTENT_CHARS = 10;
export const MIN_KEYWORD_TEXT_LENGTH = 50;
export const MIN_KEYWORD_LENGTH = 3;
export const MIN_STATISTICAL_KEYWORDS = 2;
export const FALLBACK_KEYWORD = 'content';
export const FREQUENT_WORD_COUNT = 5;

/**
 * Document layout
 */
export const HEADING_MAX_LENGTH = 100;
export const LONG_PARAGRAPH_LENGTH = 500;

/**
 * Artifact naming
 */
export const ARTIFACT_EXTENSION = '.pdf';
export const NAME_KEYWORDS_MAX_LENGTH = 50;
export const NAME_DOMAIN_MAX_LENGTH = 30;
export const MIN_NAME_LENGTH = 64;

export const MANIFEST_FILENAME = 'scraped_urls.json';

/**
 * Crawl defaults
 */
export const DEFAULT_MAX_PAGES = 50;
export const DEFAULT_OUTPUT_DIR = './output';
export const DEFAULT_DELAY_MS = 2000;
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 5000;
export const DEFAULT_BATCH_SIZE = 25;
export const DEFAULT_NUM_KEYWORDS = 3;
export const DEFAULT_KEYWORD_MAX_NGRAM = 2;
export const DEFAULT_LANGUAGE = 'de' as const;
export const DEFAULT_DOMAIN_SCOPE = 'contains' as const;
export const DEFAULT_MAX_NAME_LENGTH = 150;

/**
 * User agent string
 */
export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const APP_NAME = 'Sitepress';
export const APP_VERSION = '1.0.0';

/**
 * Answers accepted as confirmation at the CLI prompt
 */
export const AFFIRMATIVE_ANSWERS = ['yes', 'y', 'ja', 'j'];

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 2;
export const EXIT_INTERRUPTED = 130;
