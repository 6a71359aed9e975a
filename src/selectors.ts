/**
 * Portal selectors, text labels and wait budgets.
 *
 * The portal is a server-rendered Rails app with jQuery UI widgets. When its markup
 * changes, update the selectors here in one place.
 */

// ============================================================================
// TIMEOUTS (ms)
// ============================================================================

export const TIMEOUTS = {
  IMPORTANT_INFO: 5000,
  LOGIN_FORM: 10000,
  CONSENT_CHECKBOX: 5000,
  POST_LOGIN: 10000,
  CLICKABLE: 5000,
  CARDS: 20000,
  CONTINUE_PROBE: 5000,
  ACCORDION: 10000,
  RESCHEDULE_PAGE: 10000,
  FACILITY_SELECT: 10000,
  CALENDAR: 10000,
  CALENDAR_VISIBLE_PROBE: 1000,
  TIME_SELECT: 10000,
  READ: 2000,
  BOOKING_CONFIRMATION: 10000,
  // Enabled/visible state lags layout after scrolling.
  SCROLL_SETTLE: 500,
  NAVIGATION_SETTLE: 2000,
  LOCATION_SETTLE: 2000,
  DATE_SETTLE: 1000,
} as const;

// ============================================================================
// TEXT
// ============================================================================

export const TEXT = {
  CONTINUE: 'Continue',
  IVR_LABEL: 'IVR Account Number:',
  RESCHEDULE_ACCORDION: 'Reschedule Appointment',
  RESCHEDULE_LINK: 'Reschedule',
} as const;

// ============================================================================
// SELECTORS
// ============================================================================

export const SELECTORS = {
  // Sign-in
  IMPORTANT_INFO_ARROW: '.down-arrow',
  PAGE_HEADER: '#header',
  SIGN_IN_FORM: '#sign_in_form',
  EMAIL_INPUT: '#user_email',
  PASSWORD_INPUT: '#user_password',
  POLICY_CHECKBOX: '#policy_confirmed',
  SIGN_IN_SUBMIT: 'input.button.primary[name="commit"]',

  // Group page
  APPLICATION_CARD: '.application',
  STYLED_BUTTON: 'a.button.primary.small',
  ANY_LINK: 'a',

  // Account actions
  ACCORDION: '.accordion',
  ACCORDION_TITLE: '.accordion-item a.accordion-title',
  RESCHEDULE_CONTENT: `.accordion-content:has(a:has-text("${TEXT.RESCHEDULE_LINK}"))`,
  RESCHEDULE_BUTTON: 'a.button.small.primary',

  // Reschedule form
  FACILITY_SELECT: '#appointments_consulate_appointment_facility_id',
  FACILITY_OPTION: '#appointments_consulate_appointment_facility_id option',
  DATE_INPUT: '#appointments_consulate_appointment_date',
  CALENDAR: '.ui-datepicker-calendar',
  AVAILABLE_DAY_CELL: '.ui-datepicker-calendar td:not(.ui-datepicker-unselectable):has(a)',
  TIME_SELECT: '#appointments_consulate_appointment_time',
  TIME_OPTION: '#appointments_consulate_appointment_time option',
  BOOK_SUBMIT: '#appointments_submit',
  BOOKING_CONFIRMATION: '.confirmation-page',

  // Inline error regions
  ERROR_MESSAGE: '.error-message',
  ALERT: '.alert',
} as const;

export function linkWithText(text: string): string {
  return `a:text-is("${text}")`;
}

export function linkContainingText(text: string): string {
  return `a:has-text("${text}")`;
}

export function dayLinkSelector(year: string, month: string, day: string): string {
  return `.ui-datepicker-calendar td[data-year="${year}"][data-month="${month}"]:not(.ui-datepicker-unselectable) ${linkWithText(day)}`;
}
