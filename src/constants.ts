/** Host name that resolves to the Docker host from inside a container. */
export const DOCKER_INTERNAL_HOST = 'host.docker.internal';

export const LOCAL_HOST = 'localhost';
