export const APP_VERSION = '1.0.0';

export const JOB_RETRY_LIMIT = 0;
export const JOB_RETRY_DELAY_SECONDS = 30;

export const UNCLEAR_CHOICE = '___unclear';
export const INVALID_CHOICE = '___invalid';

export const POINTS_PER_VALID_JUDGEMENT = 1;

export const DEFAULT_SCHEDULE_SOURCE = 'file::assets/schedule.png';
export const DEFAULT_CITY_GUIDE_SOURCE = 'file::assets/survival_guide.pdf';

// Night shift: before this local hour the previous day's safety team is on duty.
export const SAFETY_DAY_ROLLOVER_HOUR = 6;

export const VALID_SUBMISSION_REACTION = '❤️';

export const DISCORD_SELECT_OPTION_LIMIT = 25;
export const DISCORD_SELECT_MENU_ROW_LIMIT = 4;
