export type ShaderDescriptor = {
  label: string;
  code: string;
  vertexEntrypoint: string;
  fragmentEntrypoint: string;
};
