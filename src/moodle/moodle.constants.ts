export const MOODLE_HTTP = 'MOODLE_HTTP';
export const MOODLE_REST_PATH = '/webservice/rest/server.php';
