import { defineResource } from "../../src/index.js";

export interface User {
  id: string;
  email: string;
}

export interface Widget {
  id: string;
  name: string;
  weight?: number;
  owner?: User | null;
}

export interface Vcs {
  id: string;
  clientId: string;
}

export interface Workspace {
  id: string;
  name: string;
  description?: string | null;
  locked: boolean;
  settings: { retries: number };
  vcs?: Vcs;
  notes?: string;
}

/** A related record type with no primary field. */
export interface Anonymous {
  label: string;
}

export const userSchema = defineResource<User>({
  fields: { id: "primary,users", email: "attr,email" },
});

export const widgetSchema = defineResource<Widget>({
  fields: {
    id: "primary,widgets",
    name: "attr,name",
    weight: "attr,weight",
    owner: "relation,owner",
  },
  related: { owner: userSchema },
});

export const vcsSchema = defineResource<Vcs>({
  fields: { id: "primary,vcs", clientId: "attr,clientId" },
});

export const workspaceSchema = defineResource<Workspace>({
  fields: {
    id: "primary,workspace",
    name: "attr,name",
    description: "attr,description",
    locked: "attr,locked",
    settings: "attr,settings",
    vcs: "relation,vcs,omitempty",
    notes: "",
  },
  related: { vcs: () => vcsSchema },
});
