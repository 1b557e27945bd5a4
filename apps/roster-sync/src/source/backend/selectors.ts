/**
 * Backend call-record page layout (0-based cell indexes)
 */
export const SELECTORS = {
  table: 'table',
  pageNumberSelect: 'select[name="selectpagenumber"] option',
} as const

export const COLUMNS = {
  radioId: 6,
  groupId: 9, // 310564 = MWave
  network: 11,
} as const

export const MIN_CELLS = 12

export const LOGIN_FIELDS = {
  user: 'user',
  password: 'pass',
  submit: 'Login',
} as const
