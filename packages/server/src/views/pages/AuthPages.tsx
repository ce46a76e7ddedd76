import { MIN_PASSWORD_LENGTH } from '@magic-chef/shared';

interface LoginPageProps {
  next: string;
}

export function LoginPage({ next }: LoginPageProps): JSX.Element {
  return (
    <section>
      <h1>Log in</h1>
      <form method="post" action="/auth/login" hx-post="/auth/login">
        <input type="hidden" name="next" value={next} />
        <label>
          Username
          <input type="text" name="username" autoComplete="username" required />
        </label>
        <label>
          Password
          <input type="password" name="password" autoComplete="current-password" required />
        </label>
        <button type="submit">Log in</button>
      </form>
      <p>
        No account yet? <a href="/auth/register">Register</a>
      </p>
    </section>
  );
}

export function RegisterPage(): JSX.Element {
  return (
    <section>
      <h1>Register</h1>
      <form method="post" action="/auth/register" hx-post="/auth/register">
        <label>
          Username
          <input type="text" name="username" autoComplete="username" required />
        </label>
        <label>
          Email
          <input type="email" name="email" autoComplete="email" required />
        </label>
        <label>
          Password
          <input type="password" name="password" minLength={MIN_PASSWORD_LENGTH} autoComplete="new-password" required />
        </label>
        <label>
          Repeat password
          <input type="password" name="password2" autoComplete="new-password" required />
        </label>
        <button type="submit">Create account</button>
      </form>
      <p>
        Already registered? <a href="/auth/login">Log in</a>
      </p>
    </section>
  );
}
