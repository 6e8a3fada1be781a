// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/components/ProfileForm`
 * Purpose: Edits the session user's names, location, intro, bio and links.
 * Scope: Client component. Sends the whole form as one PATCH; blank inputs clear the field.
 * Invariants: Values stay in the form after a failed save so per-field errors can be corrected in place.
 * Side-effects: IO (fetch, router refresh)
 * Links: app/api/v1/me/profile, contracts/profiles.me.v1.contract
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";
import type { ProfileDto } from "@/contracts/profiles.read.v1.contract";

const LINK_FIELDS = [
  ["github", "GitHub"],
  ["x", "X"],
  ["linkedin", "LinkedIn"],
  ["youtube", "YouTube"],
  ["website", "Website"],
] as const;

type LinkField = (typeof LINK_FIELDS)[number][0];

function blankToNull(value: string): string | null {
  return value.trim() === "" ? null : value;
}

export function ProfileForm({ profile }: { profile: ProfileDto }): ReactElement {
  const router = useRouter();
  const [values, setValues] = useState({
    firstName: profile.firstName ?? "",
    lastName: profile.lastName ?? "",
    location: profile.location ?? "",
    shortIntro: profile.shortIntro ?? "",
    bio: profile.bio ?? "",
  });
  const [links, setLinks] = useState<Record<LinkField, string>>({
    github: profile.links.github ?? "",
    x: profile.links.x ?? "",
    linkedin: profile.links.linkedin ?? "",
    youtube: profile.links.youtube ?? "",
    website: profile.links.website ?? "",
  });
  const [saved, setSaved] = useState(false);

  const { state, submit } = useApiForm({
    url: "/api/v1/me/profile",
    method: "PATCH",
    onSuccess: () => {
      setSaved(true);
      router.refresh();
    },
  });

  const set = (key: keyof typeof values) => (value: string) =>
    setValues((prev) => ({ ...prev, [key]: value }));
  const setLink = (key: LinkField) => (value: string) =>
    setLinks((prev) => ({ ...prev, [key]: value }));

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    setSaved(false);
    void submit({
      firstName: blankToNull(values.firstName),
      lastName: blankToNull(values.lastName),
      location: blankToNull(values.location),
      shortIntro: blankToNull(values.shortIntro),
      bio: blankToNull(values.bio),
      links: {
        github: blankToNull(links.github),
        x: blankToNull(links.x),
        linkedin: blankToNull(links.linkedin),
        youtube: blankToNull(links.youtube),
        website: blankToNull(links.website),
      },
    });
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <h2>Profile</h2>
      <FormError message={state.error} />
      {saved && <p role="status">Profile saved.</p>}
      <FormField
        name="firstName"
        label="First name"
        value={values.firstName}
        onChange={set("firstName")}
        errors={state.fieldErrors.firstName}
      />
      <FormField
        name="lastName"
        label="Last name"
        value={values.lastName}
        onChange={set("lastName")}
        errors={state.fieldErrors.lastName}
      />
      <FormField
        name="location"
        label="Location"
        value={values.location}
        onChange={set("location")}
        errors={state.fieldErrors.location}
      />
      <FormField
        name="shortIntro"
        label="Short intro"
        value={values.shortIntro}
        onChange={set("shortIntro")}
        errors={state.fieldErrors.shortIntro}
      />
      <FormField
        name="bio"
        label="Bio"
        multiline
        value={values.bio}
        onChange={set("bio")}
        errors={state.fieldErrors.bio}
      />
      {LINK_FIELDS.map(([key, label]) => (
        <FormField
          key={key}
          name={key}
          label={label}
          type="url"
          value={links[key]}
          onChange={setLink(key)}
          errors={state.fieldErrors[key]}
        />
      ))}
      <button type="submit" disabled={state.pending}>
        Save profile
      </button>
    </form>
  );
}
