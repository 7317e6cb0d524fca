import { useState, type FormEvent } from "react";

export type Credentials = {
  username: string;
  password: string;
  email?: string;
};

type LoginPanelProps = {
  onLogin: (credentials: Credentials) => Promise<void>;
  onRegister: (credentials: Credentials) => Promise<void>;
};

type Mode = "login" | "register";

export const LoginPanel = ({ onLogin, onRegister }: LoginPanelProps) => {
  const [mode, setMode] = useState<Mode>("login");
  const [username, setUsername] = useState("");
  const [password, setPassword] = useState("");
  const [email, setEmail] = useState("");
  const [error, setError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!username.trim() || !password) {
      setError("Please provide both username and password");
      return;
    }
    setSubmitting(true);
    setError(null);
    try {
      if (mode === "login") {
        await onLogin({ username: username.trim(), password });
      } else {
        await onRegister({ username: username.trim(), password, email: email.trim() });
      }
    } catch (submitError) {
      setError(submitError instanceof Error ? submitError.message : "Request failed.");
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <section className="auth">
      <h2>{mode === "login" ? "Sign in" : "Create an account"}</h2>
      <form onSubmit={(event) => void handleSubmit(event)}>
        <label className="field">
          Username
          <input
            type="text"
            autoComplete="username"
            value={username}
            onChange={(event) => setUsername(event.target.value)}
          />
        </label>
        {mode === "register" && (
          <label className="field">
            Email (optional)
            <input
              type="email"
              autoComplete="email"
              value={email}
              onChange={(event) => setEmail(event.target.value)}
            />
          </label>
        )}
        <label className="field">
          Password
          <input
            type="password"
            autoComplete={mode === "login" ? "current-password" : "new-password"}
            value={password}
            onChange={(event) => setPassword(event.target.value)}
          />
        </label>
        <button type="submit" disabled={submitting}>
          {mode === "login" ? "Sign in" : "Register"}
        </button>
      </form>
      {error && (
        <p className="error" role="alert">
          {error}
        </p>
      )}
      <button
        type="button"
        className="link"
        onClick={() => {
          setMode(mode === "login" ? "register" : "login");
          setError(null);
        }}
      >
        {mode === "login" ? "Need an account? Register" : "Already registered? Sign in"}
      </button>
    </section>
  );
};
