import { validateEmail } from './emailValidation';

export const MIN_PASSWORD_LENGTH = 6;

export type FormField = 'email' | 'username' | 'password' | 'confirmPassword' | 'phone' | 'code';

export type FieldError = { field: FormField; message: string };

export type SignupForm = {
  email: string;
  username: string;
  password: string;
  confirmPassword?: string;
};

export type LoginForm = { email: string; password: string };

const emailError = (email: string): FieldError | null => {
  const { reason } = validateEmail(email);
  if (reason === 'empty') return { field: 'email', message: 'Please enter your email' };
  if (reason === 'invalid_format') {
    return { field: 'email', message: 'Please enter a valid email address' };
  }
  return null;
};

const passwordError = (password: string, emptyMessage: string): FieldError | null => {
  if (!password) return { field: 'password', message: emptyMessage };
  if (password.length < MIN_PASSWORD_LENGTH) {
    return {
      field: 'password',
      message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
    };
  }
  return null;
};

// Validators return the first failing field in on-screen order, or null.

export const validateSignupForm = (form: SignupForm): FieldError | null => {
  const email = emailError(form.email);
  if (email) return email;
  if (!form.username.trim()) return { field: 'username', message: 'Please enter a username' };
  const password = passwordError(form.password, 'Please enter a password');
  if (password) return password;
  // Confirmation is only checked when the call site collects it.
  if (form.confirmPassword !== undefined) {
    if (!form.confirmPassword) {
      return { field: 'confirmPassword', message: 'Please confirm your password' };
    }
    if (form.confirmPassword !== form.password) {
      return { field: 'confirmPassword', message: 'Passwords do not match' };
    }
  }
  return null;
};

export const validateLoginForm = (form: LoginForm): FieldError | null =>
  emailError(form.email) ?? passwordError(form.password, 'Please enter your password');

export const validateResetForm = (email: string): FieldError | null => emailError(email);

export const normalizePhoneNumber = (raw: string): string =>
  String(raw || '').replace(/[\s-]/g, '');

export const validatePhoneForm = (phoneNumber: string): FieldError | null =>
  normalizePhoneNumber(phoneNumber)
    ? null
    : { field: 'phone', message: 'Please enter your phone number' };

export const validateCodeForm = (code: string): FieldError | null =>
  String(code || '').trim() ? null : { field: 'code', message: 'Please enter the code' };
