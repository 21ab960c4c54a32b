export const main = {
  backgroundColor: '#f6f9fc',
  fontFamily:
    'ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Helvetica, Arial, sans-serif',
  padding: '32px 0',
} as const;

export const container = {
  backgroundColor: '#ffffff',
  borderRadius: '16px',
  border: '1px solid #e5e7eb',
  margin: '0 auto',
  padding: '28px',
  width: '100%',
  maxWidth: '560px',
} as const;

export const h1 = {
  color: '#111827',
  fontSize: '22px',
  fontWeight: 800,
  lineHeight: '28px',
  margin: '0 0 12px',
} as const;

export const p = {
  color: '#374151',
  fontSize: '14px',
  lineHeight: '22px',
  margin: '0 0 12px',
} as const;

export const label = {
  color: '#6b7280',
  fontSize: '12px',
  lineHeight: '18px',
  margin: '0',
  textTransform: 'uppercase',
} as const;

export const value = {
  color: '#111827',
  fontSize: '14px',
  lineHeight: '22px',
  margin: '0 0 10px',
} as const;

export const button = {
  backgroundColor: '#0ea5e9',
  borderRadius: '10px',
  color: '#ffffff',
  display: 'inline-block',
  fontSize: '14px',
  fontWeight: 700,
  padding: '12px 18px',
  textDecoration: 'none',
} as const;

export const footerText = {
  color: '#6b7280',
  fontSize: '12px',
  lineHeight: '18px',
  margin: '0',
} as const;

export const divider = { borderColor: '#e5e7eb', margin: '18px 0' } as const;
