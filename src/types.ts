export type ProjectType = "flutter" | "dotnet_maui" | "xamarin";

export type Project = {
  name: string;
  type: ProjectType;
  gitUrl: string;
  devBranch: string;
  releaseBranch: string;
  localPath: string;
  projectFilePath: string;
};
