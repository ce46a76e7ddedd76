import {
  LANGUAGE_NAMES,
  MIN_PASSWORD_LENGTH,
  SUPPORTED_LANGUAGES,
  type User,
} from '@magic-chef/shared';

interface SettingsPageProps {
  user: User;
}

export function SettingsPage({ user }: SettingsPageProps): JSX.Element {
  return (
    <section>
      <h1>Settings</h1>
      <form method="post" action="/settings" hx-post="/settings">
        <h2>Profile</h2>
        <div className="grid">
          <label>
            First name
            <input type="text" name="first_name" defaultValue={user.first_name ?? ''} />
          </label>
          <label>
            Last name
            <input type="text" name="last_name" defaultValue={user.last_name ?? ''} />
          </label>
        </div>
        <label>
          Email
          <input type="email" name="email" defaultValue={user.email} required />
        </label>
        <label>
          Preferred language
          <select name="language" defaultValue={user.language}>
            {SUPPORTED_LANGUAGES.map((code) => (
              <option key={code} value={code}>
                {LANGUAGE_NAMES[code]}
              </option>
            ))}
          </select>
        </label>
        <button type="submit">Save profile</button>
      </form>

      <form method="post" action="/settings/password" hx-post="/settings/password">
        <h2>Change password</h2>
        <label>
          Current password
          <input type="password" name="old_password" autoComplete="current-password" required />
        </label>
        <label>
          New password
          <input type="password" name="new_password" minLength={MIN_PASSWORD_LENGTH} autoComplete="new-password" required />
        </label>
        <label>
          Repeat new password
          <input type="password" name="confirm_password" autoComplete="new-password" required />
        </label>
        <button type="submit">Change password</button>
      </form>
    </section>
  );
}
