export const DETAIL_DIR = 'detail';
export const PLATFORM_INFO_FILE = 'platform_info.json';
export const UNKNOWN_PLATFORM_FOLDER = 'unknown_platform';
export const UNKNOWN_GAME_FOLDER = 'unknown_game';
