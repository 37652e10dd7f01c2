// In-page scripts, evaluated as expression strings.

/** Visible submit controls, tried in order before falling back to the form itself. */
export const SUBMIT_SELECTORS: readonly string[] = [
  'input[type="submit"]',
  'button[type="submit"]',
  'button:has-text("Submit")',
  'button:has-text("Log in")',
  'button:has-text("Login")',
  'button:has-text("Sign in")',
  'button:has-text("Search")',
  'button:has-text("Send")',
];

/** Clicks the first clickable element whose text, value or aria-label contains `target`. */
export function clickScript(target: string): string {
  return `(() => {
  const wanted = ${JSON.stringify(target.toLowerCase())};
  const nodes = document.querySelectorAll('a, button, [role="button"], input[type="submit"], input[type="button"]');
  for (const el of nodes) {
    const label = [el.innerText, el.value, el.getAttribute('aria-label')].filter(Boolean).join(' ').toLowerCase();
    if (label.includes(wanted)) {
      el.click();
      return true;
    }
  }
  return false;
})()`;
}

export const FORM_SUBMIT_SCRIPT = `(() => {
  const active = document.activeElement;
  const form = (active && active.form) || document.querySelector('form');
  if (!form) return false;
  if (typeof form.requestSubmit === 'function') form.requestSubmit();
  else form.dispatchEvent(new Event('submit', { bubbles: true, cancelable: true }));
  return true;
})()`;

export const PAGE_TEXT_SCRIPT = "document.body ? document.body.innerText : ''";
